/**
 * CLI entry point.
 * Run with: npx tsx scripts/lexnorm.ts <pdf | directory | url>
 */
import { runCli } from "../src/cli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
