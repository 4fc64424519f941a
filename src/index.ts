import { config } from "dotenv";
import { createCliProgram } from "./cli";
import { getErrorMessage } from "./utils/errors";
import { logger } from "./utils/logger";

// Load .env before commander reads option defaults from the environment
config();

createCliProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(`❌ ${getErrorMessage(error)}`);
    process.exit(1);
  });
