/**
 * forg init - 대화형으로 .forg.yaml 생성
 */

import { existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { confirm, input, select } from "@inquirer/prompts";
import pc from "picocolors";
import { SETTINGS_FILE_NAME } from "../config/constants.js";
import { loadSettings, saveSettings, type Settings } from "../config/loader.js";

export function validateDepth(value: string): true | string {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed) && Number(trimmed) >= 1) return true;
  return "Enter an integer >= 1";
}

export async function runInit(cwd: string, homeDir: string = homedir()): Promise<number> {
  const current = loadSettings(cwd, homeDir).settings;

  console.log(pc.bold("\nforg settings\n"));

  const prefix = await input({
    message: "Folder name prefix (leave empty for none):",
    default: current.prefix,
  });

  const recursive = await confirm({
    message: "Process subdirectories recursively?",
    default: current.recursive,
  });

  let depth = current.depth;
  if (recursive) {
    const answer = await input({
      message: "Maximum depth:",
      default: String(current.depth),
      validate: validateDepth,
    });
    depth = Number(answer.trim());
  }

  const verbose = await confirm({
    message: "Show detailed progress (verbose)?",
    default: current.verbose,
  });

  const dryRun = await confirm({
    message: "Only preview changes by default (dry run)?",
    default: current.dryRun,
  });

  const localPath = join(cwd, SETTINGS_FILE_NAME);
  const homePath = join(homeDir, SETTINGS_FILE_NAME);
  const target = await select({
    message: "Where should the settings be saved?",
    choices: [
      { name: `This directory (${localPath})`, value: localPath },
      { name: `Home directory (${homePath})`, value: homePath },
    ],
  });

  if (existsSync(target)) {
    const overwrite = await confirm({
      message: `${target} already exists. Overwrite?`,
      default: false,
    });
    if (!overwrite) {
      console.log("Cancelled. Nothing was written.");
      return 0;
    }
  }

  const settings: Settings = { prefix: prefix.trim(), verbose, dryRun, recursive, depth };
  saveSettings(target, settings);
  console.log(pc.green(`✓ Settings saved to ${target}`));
  return 0;
}
