export {
	CONFIG_FILE_NAME,
	CONFIG_TEMPLATE_NAME,
	findConfigPath,
	findRepoRoot,
	getConfig,
	getConfigDir,
	getConfigPath,
	initConfig,
	isConfigInitialized,
	loadConfig,
	parseConfig,
	resetConfig,
	resolveConfigRelative,
} from './loader';

export { type ImportConfig, type LedgerConfig, type TallyConfig, TallyConfigSchema } from './schema';
