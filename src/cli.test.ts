import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { main, outputName, parseArgs, sanitizeFilename } from './cli';
import type { ConvertedPage } from './dom';

describe('parseArgs', () => {
	it('collects files and options', () => {
		expect(parseArgs(['a.html', '-o', 'docs', 'b.html', '--url', 'https://wiki.test/p'])).toEqual({
			files: ['a.html', 'b.html'],
			out: 'docs',
			url: 'https://wiki.test/p',
			help: false,
			version: false,
		});
	});

	it('reads flags', () => {
		const args = parseArgs(['--help', '-v', '-c', 'sites.json']);
		expect(args.help).toBe(true);
		expect(args.version).toBe(true);
		expect(args.config).toBe('sites.json');
	});

	it('rejects unknown options and missing values', () => {
		expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
		expect(() => parseArgs(['--out'])).toThrow('--out needs a value');
		expect(() => parseArgs(['-o', '-v'])).toThrow('-o needs a value');
	});
});

describe('sanitizeFilename', () => {
	it('replaces reserved characters', () => {
		expect(sanitizeFilename('a/b: c?')).toBe('a_b_ c_');
	});

	it('trims dots and spaces at the ends', () => {
		expect(sanitizeFilename('  .hidden. ')).toBe('hidden');
	});

	it('names empty results', () => {
		expect(sanitizeFilename('...')).toBe('unnamed');
	});
});

describe('outputName', () => {
	const page: ConvertedPage = {
		title: 'Doc Title',
		markdown: '',
		links: [],
		url: 'https://wiki.test/w/intro',
		sidebarTitle: 'Intro / Setup',
	};

	it('prefers the navigation title', () => {
		expect(outputName(page, '/tmp/saved.html')).toBe('Intro _ Setup');
	});

	it('falls back to the document title, then the file name', () => {
		expect(outputName({ ...page, sidebarTitle: null }, '/tmp/saved.html')).toBe('Doc Title');
		expect(outputName({ ...page, sidebarTitle: null, title: '' }, '/tmp/saved.html')).toBe('saved');
	});
});

describe('main', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'wiki-cli-'));
		vi.spyOn(console, 'log').mockImplementation(() => undefined);
		vi.spyOn(console, 'error').mockImplementation(() => undefined);
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(dir, { recursive: true, force: true });
	});

	it('writes one Markdown file per page, named after its title', async () => {
		const page = join(dir, 'page.html');
		const config = join(dir, 'sites.json');
		const out = join(dir, 'out');
		await writeFile(
			page,
			'<html><head><title>Guide</title></head><body><div id="content"><h1>Welcome</h1><p>Body text.</p></div></body></html>'
		);
		await writeFile(config, JSON.stringify({ 'wiki.test': { selectors: ['#content'] } }));

		const code = await main([page, '--out', out, '--url', 'https://wiki.test/p', '--config', config]);

		expect(code).toBe(0);
		await expect(readFile(join(out, 'Guide.md'), 'utf8')).resolves.toBe('# Welcome\n\nBody text.\n');
		expect(console.log).toHaveBeenCalledWith(`Saved: ${join(out, 'Guide.md')}`);
	});

	it('keeps going after a failed file and reports it', async () => {
		const missing = join(dir, 'missing.html');

		const code = await main([missing, '--out', dir]);

		expect(code).toBe(1);
		expect(console.error).toHaveBeenCalledWith(`Failed to convert ${missing}:`, expect.anything());
	});

	it('stops on an unreadable config', async () => {
		const config = join(dir, 'sites.json');
		await writeFile(config, '{');

		expect(await main([join(dir, 'page.html'), '--config', config])).toBe(1);
	});

	it('prints help and rejects bad arguments', async () => {
		expect(await main(['--help'])).toBe(0);
		expect(await main(['--nope'])).toBe(1);
		expect(await main([])).toBe(1);
	});
});
