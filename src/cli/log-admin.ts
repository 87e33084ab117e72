#!/usr/bin/env node
import { loadDotEnv } from "../config/config.js";
import { errorMessage } from "../logger/errors.js";
import { createAdminProgram } from "./program.js";

// ============================================
// ENTRY POINT
// ============================================
try {
  loadDotEnv();
  createAdminProgram().parse(process.argv);
} catch (error) {
  console.error(`log-admin: ${errorMessage(error)}`);
  process.exitCode = 1;
}
