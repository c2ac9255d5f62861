import { z } from 'zod';

const currencySchema = z
	.string()
	.regex(/^[A-Za-z]{3}$/, 'Must be a 3-letter currency code')
	.transform((value) => value.toUpperCase());

const LedgerSchema = z.object({
	domestic_currency: currencySchema.default('GBP'),
	user_name: z.string().default(''),
});

// Paths are relative to the directory holding the config file unless absolute.
const PathsSchema = z.object({
	database: z.string().min(1).default('tally.db'),
});

const ImportSchema = z.object({
	inbox: z.string().min(1).default('imports/inbox'),
	archive: z.string().min(1).default('imports/archive'),
	failed: z.string().min(1).default('imports/failed'),
});

export const TallyConfigSchema = z.object({
	ledger: LedgerSchema.default({}),
	paths: PathsSchema.default({}),
	import: ImportSchema.default({}),
});

export type TallyConfig = z.infer<typeof TallyConfigSchema>;
export type LedgerConfig = z.infer<typeof LedgerSchema>;
export type ImportConfig = z.infer<typeof ImportSchema>;
