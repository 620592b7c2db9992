#!/usr/bin/env node
import "dotenv/config";
import { join } from "node:path";
import { createInterface } from "node:readline/promises";
import { createApplication, createAuthorizer } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { formatStudyResult } from "./formatting.js";
import { createLogger } from "./logger.js";

const USAGE = `Usage:
  lecture-audio-study [file]   process <INPUT_AUDIO_DIR>/<file> (prompts when omitted)
  lecture-audio-study auth     run the Google Drive consent flow and store the token`;

// Logs go to stderr so stdout carries only the study material.
const writeStderr = (line: string) => {
  process.stderr.write(`${line}\n`);
};

async function promptForFileName(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question("Enter the name of the audio file name Completely: ")).trim();
  } finally {
    rl.close();
  }
}

async function main(argv: string[]): Promise<number> {
  const [command] = argv;
  if (command === "--help" || command === "-h") {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, write: writeStderr });
  const options = {
    onAuthUrl: (url: string) => console.log(`Authorize Google Drive access by visiting:\n${url}`),
  };

  if (command === "auth") {
    const credential = await createAuthorizer(config, logger, options).authorize();
    console.log(`Google Drive authorized for: ${credential.scopes.join(", ")}`);
    return 0;
  }

  const app = await createApplication(config, logger, options);

  const fileName = command ?? (await promptForFileName());
  if (!fileName) {
    console.error(USAGE);
    return 1;
  }

  const result = await app.processing.processAudio({
    localPath: join(config.inputAudioDir, fileName),
  });
  console.log(formatStudyResult(result));
  return result.notes === undefined && result.quiz === undefined ? 1 : 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    createLogger({ write: writeStderr }).error("cli_failed", { error });
    process.exitCode = 1;
  });
