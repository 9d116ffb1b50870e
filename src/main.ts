import { getDefaultLanguageMatcher } from "@/matching";
import { runCommand } from "@/cli";
import * as logger from "@/logger";

async function main() {
  const matcher = getDefaultLanguageMatcher();
  logger.debug("Language matcher ready", { version: matcher.version });

  console.log(runCommand(matcher, process.argv.slice(2)));
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    logger.error("Fatal error", { name: error.name, error: error.message, stack: error.stack });
  } else {
    logger.error("Fatal error", { error: String(error) });
  }
  process.exit(1);
});
