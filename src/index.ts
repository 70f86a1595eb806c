#!/usr/bin/env node
import pc from "picocolors";
import { runCli } from "./cli/main.js";

runCli()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    // Ctrl+C 로 프롬프트를 빠져나온 경우
    if (err instanceof Error && err.name === "ExitPromptError") {
      console.log("\nCancelled.");
      process.exit(1);
    }

    const errMsg = err instanceof Error ? err.message : String(err);
    console.error(pc.red(`\n✗ forg failed: ${errMsg}`));
    console.error("Run 'forg --help' for usage information.");
    process.exit(1);
  });
