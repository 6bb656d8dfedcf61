import { runCli } from "./cli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Explorer failed:", error);
    process.exitCode = 1;
  });
