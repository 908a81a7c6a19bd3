import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from '../errors/CoreErrors';
import { ValidationUtils } from '../utils/ValidationUtils';
import { Logger, LoggerOptions } from '../utils/logger';
import { writeFileAtomic } from '../utils/atomicWrite';

export const DATA_FOLDER_ENV = 'TIMELEDGER_DATA_FOLDER';
export const MAX_RECENT_FOLDERS = 5;

const configSchema = z.object({
    dataFolder: z.string().min(1).nullable().default(null),
    recentFolders: z.array(z.string().min(1)).default([]),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    logFile: z.string().min(1).nullable().default(null),
});

export type LocalConfigData = z.infer<typeof configSchema>;

export interface LocalConfigOptions {
    /** Defaults to ~/.timeledger */
    configDir?: string;
    /** Defaults to process.env */
    env?: NodeJS.ProcessEnv;
    /** .env file consulted after `env`; null to skip. Defaults to ./.env */
    envFile?: string | null;
    logger?: Logger | null;
}

/**
 * Per-machine settings: where the shared data folder is and how to log.
 * Stored in <configDir>/config.json.
 */
export class LocalConfig {
    private readonly configDir: string;
    private readonly env: NodeJS.ProcessEnv;
    private readonly envFile: string | null;
    private readonly logger: Logger | null;

    constructor(options: LocalConfigOptions = {}) {
        this.configDir = options.configDir ?? path.join(os.homedir(), '.timeledger');
        this.env = options.env ?? process.env;
        this.envFile = options.envFile === undefined ? path.resolve('.env') : options.envFile;
        this.logger = options.logger ?? null;
    }

    get filePath(): string {
        return path.join(this.configDir, 'config.json');
    }

    /**
     * Read the config file; defaults when it does not exist yet
     */
    async load(): Promise<LocalConfigData> {
        if (!(await fs.pathExists(this.filePath))) {
            return configSchema.parse({});
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(await fs.readFile(this.filePath, 'utf8'));
        } catch (error) {
            throw new ValidationError(`Cannot parse ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`);
        }
        return ValidationUtils.parse(configSchema, parsed, `Invalid config file ${this.filePath}`);
    }

    async save(data: LocalConfigData): Promise<void> {
        const valid = ValidationUtils.parse(configSchema, data, 'Invalid config');
        await writeFileAtomic(this.filePath, JSON.stringify(valid, null, 2) + '\n', {
            onCleanupFailure: (temp, error) => this.logger?.error(`Could not remove ${temp}`, error),
        });
    }

    /**
     * Data folder to open: explicit argument, then TIMELEDGER_DATA_FOLDER
     * (environment, then .env), then the config file
     */
    async resolveDataFolder(explicit?: string | null): Promise<string | null> {
        if (explicit) {
            return path.resolve(explicit);
        }

        const fromEnv = this.env[DATA_FOLDER_ENV] || (await this.readEnvFile())[DATA_FOLDER_ENV];
        if (fromEnv) {
            return path.resolve(fromEnv);
        }

        const config = await this.load();
        return config.dataFolder;
    }

    /**
     * Remember a data folder and move it to the front of the recent list
     */
    async setDataFolder(folder: string): Promise<LocalConfigData> {
        const resolved = path.resolve(folder);
        const config = await this.load();
        const next: LocalConfigData = {
            ...config,
            dataFolder: resolved,
            recentFolders: [resolved, ...config.recentFolders.filter(entry => entry !== resolved)].slice(0, MAX_RECENT_FOLDERS),
        };
        await this.save(next);
        return next;
    }

    /**
     * Logger settings from the config file
     */
    async loggerOptions(): Promise<LoggerOptions> {
        const config = await this.load();
        return { level: config.logLevel, file: config.logFile };
    }

    private async readEnvFile(): Promise<Record<string, string>> {
        if (this.envFile === null || !(await fs.pathExists(this.envFile))) {
            return {};
        }
        return dotenv.parse(await fs.readFile(this.envFile));
    }
}
