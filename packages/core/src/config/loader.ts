import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import { parse as parseTOML } from 'smol-toml';
import { type TallyConfig, TallyConfigSchema } from './schema';

export const CONFIG_FILE_NAME = 'tally.config.toml';
export const CONFIG_TEMPLATE_NAME = 'tally.config.template.toml';

let configSingleton: TallyConfig | null = null;
let configPath: string | null = null;

/**
 * Walk up directory tree to find the repository root (where the config template lives).
 */
export function findRepoRoot(startDir: string): string | null {
	let dir = startDir;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, CONFIG_TEMPLATE_NAME))) {
			return dir;
		}
		dir = dirname(dir);
	}
	return null;
}

function absolute(path: string): string {
	return isAbsolute(path) ? path : join(process.cwd(), path);
}

export function findConfigPath(startPath?: string): string {
	if (startPath) {
		return absolute(startPath);
	}

	const envPath = process.env['TALLY_CONFIG_PATH'];
	if (envPath) {
		return absolute(envPath);
	}

	// TALLY_HOME is a project root holding data/
	const homeDir = process.env['TALLY_HOME'];
	if (homeDir) {
		return join(absolute(homeDir), 'data', CONFIG_FILE_NAME);
	}

	const root = findRepoRoot(process.cwd());
	if (root) {
		return join(root, 'data', CONFIG_FILE_NAME);
	}

	return join(process.cwd(), 'data', CONFIG_FILE_NAME);
}

export function parseConfig(content: string, sourcePath: string): TallyConfig {
	const data = parseTOML(content);
	const result = TallyConfigSchema.safeParse(data);

	if (!result.success) {
		const errors = result.error.issues.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
		throw new Error(`Invalid config file at ${sourcePath}:\n${errors}`);
	}

	return result.data;
}

export function loadConfig(path?: string): TallyConfig {
	const resolvedPath = findConfigPath(path);

	if (!existsSync(resolvedPath)) {
		throw new Error(`Config file not found: ${resolvedPath}\nCopy ${CONFIG_TEMPLATE_NAME} to data/${CONFIG_FILE_NAME} and customize it.`);
	}

	return parseConfig(readFileSync(resolvedPath, 'utf-8'), resolvedPath);
}

/** Loads the config file when present; a missing file leaves every key at its default. */
export function initConfig(path?: string): void {
	configPath = findConfigPath(path);
	configSingleton = existsSync(configPath) ? loadConfig(configPath) : TallyConfigSchema.parse({});
}

export function getConfig(): TallyConfig {
	if (!configSingleton) {
		throw new Error('Config not initialized. Call initConfig() first.');
	}
	return configSingleton;
}

export function isConfigInitialized(): boolean {
	return configSingleton !== null;
}

export function getConfigPath(): string | null {
	return configPath;
}

export function getConfigDir(): string | null {
	return configPath ? dirname(configPath) : null;
}

/** Resolve a configured path against the directory holding the config file. */
export function resolveConfigRelative(path: string): string {
	if (isAbsolute(path)) {
		return path;
	}
	return join(getConfigDir() ?? join(process.cwd(), 'data'), path);
}

export function resetConfig(): void {
	configSingleton = null;
	configPath = null;
}
