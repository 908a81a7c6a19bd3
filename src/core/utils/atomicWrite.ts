import fs from 'fs-extra';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IOOperation } from '../errors/CoreErrors';

export type IORunner = <T>(operation: IOOperation, target: string, work: () => Promise<T>) => Promise<T>;

export interface AtomicWriteOptions {
    /** Wraps every file system step (retry, error mapping) */
    run?: IORunner;
    /** A temp file left behind after a failed write; the write error is still raised */
    onCleanupFailure: (temp: string, error: unknown) => void;
}

const direct: IORunner = (_operation, _target, work) => work();

/**
 * Write `data` to a temporary file beside `file`, then rename it over `file`.
 * Readers see either the old content or the new, never a partial file.
 */
export async function writeFileAtomic(file: string, data: string | Buffer, options: AtomicWriteOptions): Promise<void> {
    const run = options.run ?? direct;
    const dir = path.dirname(file);
    const temp = path.join(dir, `${path.basename(file)}.${uuidv4()}.tmp`);

    await run('mkdir', dir, () => fs.ensureDir(dir));
    try {
        await run('write', temp, () => fs.writeFile(temp, data));
        await run('rename', file, () => fs.rename(temp, file));
    } catch (error) {
        try {
            await run('remove', temp, () => fs.remove(temp));
        } catch (cleanupError) {
            options.onCleanupFailure(temp, cleanupError);
        }
        throw error;
    }
}
