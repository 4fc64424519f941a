/**
 * Heading-based lookups over markdown text.
 * Both helpers return `undefined` when nothing matches; that is an expected outcome.
 */

const LEADING_HASHES = /^#+\s*/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Returns the text of the first heading-like line (any line starting with `#`),
 * without its `#` markers.
 */
export function extractTitle(markdown: string): string | undefined {
  for (const line of markdown.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#")) {
      return trimmed.replace(LEADING_HASHES, "").trim();
    }
  }
  return undefined;
}

/**
 * Returns the non-blank lines under the heading named `sectionName`
 * (case-insensitive, any level) up to the next heading.
 * An existing heading without content yields an empty string.
 */
export function extractSection(markdown: string, sectionName: string): string | undefined {
  const headingPattern = new RegExp(`^#+\\s*${escapeRegExp(sectionName.trim())}\\s*$`, "i");
  const content: string[] = [];
  let inSection = false;

  for (const line of markdown.split("\n")) {
    const trimmed = line.trim();

    if (!inSection) {
      inSection = headingPattern.test(trimmed);
      continue;
    }

    if (trimmed.startsWith("#")) {
      break;
    }
    if (trimmed) {
      content.push(line);
    }
  }

  return inSection ? content.join("\n").trim() : undefined;
}
