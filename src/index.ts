#!/usr/bin/env node

import { main } from "./cli.js";

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  }
);
