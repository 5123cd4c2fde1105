#!/usr/bin/env node

import { main } from "../src/cli/main.js";

async function run() {
  try {
    process.exitCode = await main(process.argv);
  } catch (error) {
    // Only catch truly unexpected errors that main() didn't handle
    if (error instanceof Error) {
      console.error(`Unexpected error: ${error.message}`);
    } else {
      console.error("An unexpected error occurred");
    }
    process.exit(2); // Use exit code 2 for unexpected errors
  }
}

void run();
