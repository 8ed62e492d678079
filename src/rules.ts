import { readFile } from 'node:fs/promises';

export interface SiteConfig {
	/** Content container selectors, tried in order. */
	selectors: string[];
	/** Extra selectors stripped from the content before conversion. */
	remove?: string[];
	/** Sidebar element whose lists link the wiki's pages. */
	navigation?: string;
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

/**
 * Built-in site overrides keyed by hostname.
 */
export const defaultSiteConfigs: Readonly<Record<string, SiteConfig>> = {
	/** Generated code wikis. */
	'deepwiki.com': {
		selectors: [
			'.container > div:nth-child(2) .prose',
			'.container > div:nth-child(2) .prose-custom',
			'.container > div:nth-child(2)',
		],
		remove: ['[data-copy-button]', '.sr-only'],
		navigation: '.border-r-border',
	},
	/** Documentation sites. */
	'github.com': {
		selectors: ["[data-testid='wiki-body']", '#wiki-body', "[itemprop='text']"],
		remove: ['.js-comment-edit-button', '.wiki-rightbar'],
		navigation: '.wiki-rightbar',
	},
	'developer.mozilla.org': {
		selectors: ['article'],
		remove: ['.prev-next', '.language-menu', '.on-github'],
	},
};

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Checks one user-supplied entry. A single `selector` string is accepted as
 * shorthand for a one-element `selectors` list.
 * @param host - Hostname the entry belongs to, used in error messages.
 */
export function parseSiteConfig(host: string, value: unknown): SiteConfig {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		throw new ConfigError(`Config for ${host} must be an object`);
	}

	const entry: Record<string, unknown> = { ...value };
	let selectors: string[];
	if (isStringArray(entry.selectors) && entry.selectors.length > 0) {
		selectors = entry.selectors;
	} else if (typeof entry.selector === 'string' && entry.selector.trim()) {
		selectors = [entry.selector];
	} else {
		throw new ConfigError(`Config for ${host} needs a non-empty "selectors" list`);
	}

	const config: SiteConfig = { selectors };
	if (entry.remove !== undefined) {
		if (!isStringArray(entry.remove)) {
			throw new ConfigError(`"remove" for ${host} must be a list of selectors`);
		}
		config.remove = entry.remove;
	}
	if (entry.navigation !== undefined) {
		if (typeof entry.navigation !== 'string') {
			throw new ConfigError(`"navigation" for ${host} must be a selector`);
		}
		config.navigation = entry.navigation;
	}
	return config;
}

/**
 * Reads user-defined overrides from a JSON file and merges them over
 * {@link defaultSiteConfigs}. A missing file leaves the defaults in place.
 * @param path - JSON file mapping hostnames to site configs.
 */
export async function loadCustomConfigs(path: string): Promise<Record<string, SiteConfig>> {
	let raw: string;
	try {
		raw = await readFile(path, 'utf8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return { ...defaultSiteConfigs };
		}
		throw error;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Invalid JSON in ${path}: ${reason}`);
	}
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new ConfigError(`${path} must contain an object keyed by hostname`);
	}

	const custom: Record<string, SiteConfig> = {};
	for (const [host, value] of Object.entries(parsed)) {
		custom[host] = parseSiteConfig(host, value);
	}
	return { ...defaultSiteConfigs, ...custom };
}

/**
 * Retrieves the configuration for a hostname, ignoring a leading `www.`.
 * @param configs - Merged site configurations.
 * @param hostname - Hostname to look up.
 */
export function getSiteConfig(
	configs: Readonly<Record<string, SiteConfig>>,
	hostname: string
): SiteConfig | undefined {
	return configs[hostname] ?? configs[hostname.replace(/^www\./, '')];
}
