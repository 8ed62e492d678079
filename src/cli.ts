// ============================================================================
// wiki-to-markdown CLI
//
// Converts saved, fully rendered wiki pages into Markdown files, rebuilding
// their diagrams as Mermaid blocks.
//
// Usage:
//   wiki-to-markdown page.html                        # writes ./<sidebar title>.md
//   wiki-to-markdown a.html b.html --out docs --url https://deepwiki.com/org/repo
// ============================================================================

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import type { ConvertedPage } from './dom';
import { convertHtmlToDocument } from './dom';
import { defaultSiteConfigs, loadCustomConfigs } from './rules';

const VERSION = '0.1.0';

const HELP = `wiki-to-markdown ${VERSION}

Usage: wiki-to-markdown <page.html...> [options]

Options:
  -o, --out <dir>       Output directory (default: .)
  -u, --url <url>       Address the pages were captured from; selects site rules
  -c, --config <file>   JSON file with site rule overrides
  -h, --help            Show this help
  -v, --version         Show the version`;

// ============================================================================
// Argument parsing
// ============================================================================

export interface CliArgs {
	files: string[];
	out: string;
	url?: string;
	config?: string;
	help: boolean;
	version: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
	const args: CliArgs = { files: [], out: '.', help: false, version: false };

	const valueOf = (flag: string, index: number): string => {
		const value = argv[index + 1];
		if (value === undefined || value.startsWith('-')) {
			throw new Error(`${flag} needs a value`);
		}
		return value;
	};

	let i = 0;
	while (i < argv.length) {
		const arg = argv[i] ?? '';

		switch (arg) {
			case '-h':
			case '--help':
				args.help = true;
				break;

			case '-v':
			case '--version':
				args.version = true;
				break;

			case '-o':
			case '--out':
				args.out = valueOf(arg, i);
				i += 1;
				break;

			case '-u':
			case '--url':
				args.url = valueOf(arg, i);
				i += 1;
				break;

			case '-c':
			case '--config':
				args.config = valueOf(arg, i);
				i += 1;
				break;

			default:
				if (arg.startsWith('-')) {
					throw new Error(`Unknown option: ${arg}`);
				}
				args.files.push(arg);
		}
		i += 1;
	}

	return args;
}

/**
 * Turns a page title into a safe file name.
 * @param name - Raw page title.
 */
export function sanitizeFilename(name: string): string {
	const cleaned = name.replace(/[<>:"/\\|?*\x00-\x1f]/g, '_').replace(/^[ .]+|[ .]+$/g, '');
	return cleaned.slice(0, 255) || 'unnamed';
}

/**
 * Names a converted page after its entry in the wiki's navigation, falling back
 * to the document title and then to the input file's name.
 * @param page - Converted page.
 * @param file - Path of the saved HTML it came from.
 */
export function outputName(page: ConvertedPage, file: string): string {
	return sanitizeFilename(page.sidebarTitle || page.title || basename(file, extname(file)));
}

// ============================================================================
// Main
// ============================================================================

/**
 * Converts every input file and reports progress on the console.
 * @returns Process exit code: 0 when all files converted, 1 otherwise.
 */
export async function main(argv: readonly string[]): Promise<number> {
	let args: CliArgs;
	try {
		args = parseArgs(argv);
	} catch (error) {
		console.error(error instanceof Error ? error.message : String(error));
		console.error(HELP);
		return 1;
	}

	if (args.help) {
		console.log(HELP);
		return 0;
	}
	if (args.version) {
		console.log(VERSION);
		return 0;
	}
	if (args.files.length === 0) {
		console.error(HELP);
		return 1;
	}

	let configs = defaultSiteConfigs;
	if (args.config) {
		try {
			configs = await loadCustomConfigs(args.config);
		} catch (error) {
			console.error(`Failed to load ${args.config}:`, error);
			return 1;
		}
	}
	await mkdir(args.out, { recursive: true });

	let failed = 0;
	for (const file of args.files) {
		try {
			const html = await readFile(file, 'utf8');
			const page = convertHtmlToDocument(html, { url: args.url, configs });
			const target = join(args.out, `${outputName(page, file)}.md`);
			await writeFile(target, `${page.markdown}\n`, 'utf8');
			console.log(`Saved: ${target}`);
		} catch (error) {
			failed += 1;
			console.error(`Failed to convert ${file}:`, error);
		}
	}

	return failed > 0 ? 1 : 0;
}
