/**
 * stack-deployer
 *
 * Staged deployment of the containerised banking stack: infrastructure,
 * then application services, gated on health checks, followed by test
 * suites and a final validation pass.
 *
 * This is the library entry point; the CLI lives in src/cli.ts.
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
