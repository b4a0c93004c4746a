#!/usr/bin/env node
import { loadDotenv } from "../config.js";
import { runRecapJob } from "./runRecapJob.js";

loadDotenv();

runRecapJob(process.argv.slice(2)).then(
  (result) => {
    if (!result.ok) {
      console.error(result.error.message);
      process.exit(result.error.exitCode);
    }
  },
  (err) => {
    console.error("Recap failed:", err);
    process.exit(1);
  }
);
