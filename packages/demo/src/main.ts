#!/usr/bin/env node
/**
 * @zoneledger/demo — CLI entry point.
 */

import chalk from "chalk";
import { runDemo } from "./demo.js";

runDemo().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
