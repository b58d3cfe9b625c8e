// ============================================
// APY Monitor Entry Point
// Triggered by an external scheduler; one run per invocation.
// ============================================

import { runCli } from "./cli.js";

process.exitCode = await runCli();
