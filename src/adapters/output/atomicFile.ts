// src/adapters/output/atomicFile.ts

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../../utils/logger';

/**
 * Runs `produce` against a temporary sibling of `target` and renames it into
 * place on success. On failure the temporary file is removed and the error
 * is rethrown; an existing `target` is left untouched.
 */
export async function writeAtomically(target: string, produce: (tempPath: string) => Promise<void>): Promise<void> {
    const dir = path.dirname(target);
    await fs.promises.mkdir(dir, { recursive: true });

    const tempPath = path.join(dir, `.${path.basename(target)}.${process.pid}.tmp`);
    try {
        await produce(tempPath);
        await fs.promises.rename(tempPath, target);
    } catch (error) {
        await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
            logger().warn(`[Output] Could not remove temporary file ${tempPath}: ${String(cleanupError)}`);
        });
        throw error;
    }
}
