#!/usr/bin/env node
// Load environment variables BEFORE any other imports
import 'dotenv/config';

import { resolveConfigPath } from "./config/generator-config";
import { runGenerator } from "./app/runGenerator";
import { describeError, GeneratorError } from "./utils/errors";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
    const configPath = resolveConfigPath(process.argv.slice(2));
    logger().info(`[BOOT] Starting production data generator (config: ${configPath})`);

    const run = await runGenerator(configPath);

    logger().info(`[BOOT] Data successfully generated and saved to ${run.outputPath}`);
}

main().catch((error: unknown) => {
    const context = error instanceof GeneratorError ? { code: error.code, ...error.context } : undefined;
    logger().error(context ?? {}, `[BOOT] Generation failed: ${describeError(error)}`);
    process.exitCode = 1;
});
