import { isDiagramSvg, reconstructDiagram } from './diagrams';
import type { ElementNode, RenderedNode } from './nodes';
import {
	byTag,
	classList,
	collapsedText,
	elementChildren,
	findAll,
	findFirst,
	getAttr,
	isElement,
	textContent,
} from './nodes';

/**
 * Page chrome that never carries article content.
 */
export const SKIPPED_TAGS = new Set([
	'script',
	'style',
	'noscript',
	'template',
	'iframe',
	'button',
	'header',
	'footer',
	'nav',
]);

/**
 * Tags without a rule of their own that flow inline: their children are joined
 * without block spacing.
 */
export const INLINE_TAGS = new Set([
	'span',
	'sup',
	'sub',
	'small',
	'mark',
	'abbr',
	'cite',
	'q',
	'u',
	's',
	'del',
	'ins',
	'kbd',
	'samp',
	'var',
	'time',
	'label',
	'font',
	'bdi',
	'data',
	'tspan',
]);

const HIDDEN_STYLE = /display\s*:\s*none|visibility\s*:\s*hidden/i;
const LINE_CITATION = /#L(\d+)(?:-L(\d+))?$/;

// ---------------------------------------------------------------------------
// Pure string helpers
// ---------------------------------------------------------------------------

/**
 * Returns the first string with non-whitespace content from the provided list.
 * @param values - Candidate string values to scan.
 */
export function firstNonEmpty(values: Array<string | null | undefined>): string | null {
	for (const value of values) {
		if (typeof value !== 'string') {
			continue;
		}
		const trimmed = value.trim();
		if (trimmed) {
			return trimmed;
		}
	}
	return null;
}

/**
 * Normalises fenced code blocks by trimming leading and trailing blank lines.
 * @param code - Code block content extracted from the tree.
 */
export function trimFencePadding(code: string): string {
	const lines = code.replace(/\r\n/g, '\n').split('\n');

	while (lines.length > 0 && lines[0]?.trim() === '') {
		lines.shift();
	}

	while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') {
		lines.pop();
	}

	return lines.join('\n');
}

/**
 * Collapses runs of blank lines to a single blank line and trims the result.
 * Lines holding only whitespace count as blank. Applying it twice changes nothing.
 * @param markdown - Joined block output.
 */
export function normalizeBlankLines(markdown: string): string {
	return markdown
		.replace(/^[ \t]+$/gm, '')
		.trim()
		.replace(/\n{3,}/g, '\n\n');
}

/**
 * Joins converted blocks of one page into the final document text.
 */
export function assembleDocument(blocks: readonly string[]): string {
	return normalizeBlankLines(blocks.join(''));
}

function prefixLines(content: string, prefix: string): string {
	return content
		.split('\n')
		.map((line) => (line ? `${prefix}${line}` : prefix.trimEnd()))
		.join('\n');
}

function fence(language: string, body: string): string {
	return `\n\`\`\`${language}\n${body}\n\`\`\`\n\n`;
}

// ---------------------------------------------------------------------------
// Code language
// ---------------------------------------------------------------------------

function looksLikeJson(code: string): boolean {
	const wrapped =
		(code.startsWith('{') && code.endsWith('}')) || (code.startsWith('[') && code.endsWith(']'));
	if (!wrapped) {
		return false;
	}
	try {
		JSON.parse(code);
		return true;
	} catch {
		return false;
	}
}

const LANGUAGE_CUES: ReadonlyArray<[string, (code: string, firstLine: string) => boolean]> = [
	[
		'typescript',
		(code) =>
			/\b(function|const|let|var) /.test(code) &&
			code.includes(': ') &&
			/\b(interface|type) /.test(code),
	],
	['javascript', (code) => /\b(function|const|let|var) /.test(code)],
	['ruby', (code) => code.includes('def ') && /^\s*end\s*$/m.test(code) && !code.includes(':\n')],
	[
		'python',
		(code) =>
			code.includes('def ') ||
			/^\s*(import|from) \S+/m.test(code) ||
			code.includes('print('),
	],
	[
		'java',
		(code) =>
			code.includes('public class ') ||
			code.includes('private ') ||
			code.includes('public static void main'),
	],
	['csharp', (code) => code.includes('using System') || code.includes('namespace ')],
	['cpp', (code) => code.includes('#include') && (code.includes('std::') || code.includes('cout'))],
	['c', (code) => code.includes('#include') || code.includes('int main')],
	['go', (code) => /^package \w+/m.test(code) || code.includes('func ')],
	['rust', (code) => code.includes('fn ') || code.includes('let mut')],
	[
		'php',
		(code) =>
			code.includes('<?php') ||
			(code.includes('$') && (code.includes('echo ') || code.includes('print '))),
	],
	['bash', (_code, firstLine) => firstLine.startsWith('#!') && /\b(ba)?sh\b/.test(firstLine)],
	['sql', (code) => /\b(SELECT|INSERT|UPDATE|DELETE|CREATE|ALTER|DROP)\b/i.test(code)],
	['json', looksLikeJson],
	['html', (code) => code.includes('<!DOCTYPE') || code.includes('<html')],
	['xml', (code) => code.includes('<?xml') || (/<\w/.test(code) && code.includes('</'))],
	['css', (code) => /[^{}]+\{[^{}]*:[^{}]*\}/.test(code)],
	['dockerfile', (code) => /^FROM \S+/m.test(code) && /^(RUN|COPY|CMD) /m.test(code)],
	['yaml', (code) => code.split('\n').some((line) => /^\s*[\w-]+:(\s|$)/.test(line))],
	['markdown', (code) => /^#{1,6} /m.test(code) || code.includes('```')],
];

/**
 * Guesses a fence language from lexical cues. The guess only decorates the
 * fence; an empty string means no guess.
 * @param codeText - Raw code block text.
 */
export function detectCodeLanguage(codeText: string): string {
	const code = codeText.trim();
	if (code.length < 10) {
		return '';
	}
	const firstLine = code.split('\n')[0]?.trim() ?? '';
	const match = LANGUAGE_CUES.find(([, test]) => test(code, firstLine));
	return match ? match[0] : '';
}

/**
 * Reads a language declared on the block through data attributes or
 * `language-*` style classes.
 * @param pre - The preformatted block.
 * @param code - The optional code element inside it.
 */
export function extractLanguage(pre: ElementNode, code: ElementNode | null): string | null {
	const candidates: Array<string | null | undefined> = [
		getAttr(pre, 'data-language'),
		getAttr(pre, 'data-lang'),
		getAttr(pre, 'lang'),
		code ? getAttr(code, 'data-language') : null,
		code ? getAttr(code, 'data-lang') : null,
	];

	[pre, code].forEach((el) => {
		if (!el) {
			return;
		}
		classList(el).forEach((token) => {
			const match = token.match(/^(?:language|lang|highlight)-(.+)/i);
			if (match) {
				candidates.push(match[1]);
			}
		});
	});

	const language = firstNonEmpty(candidates);
	return language ? language.toLowerCase() : null;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export interface Converter {
	convertNode(node: RenderedNode): string;
	convertChildren(node: ElementNode): string;
	/** Converts the children of a page root and assembles the document. */
	convertPage(root: RenderedNode): string;
}

/**
 * Emits the Markdown for one element. Rules call back into the converter for
 * their children so that overrides apply at every depth.
 */
export type ConversionRule = (node: ElementNode, converter: Converter) => string;

export interface ConverterLogger {
	error(message: string, ...details: unknown[]): void;
}

export interface ConverterOptions {
	/** Rules keyed by tag, added to or replacing the defaults. */
	rules?: Record<string, ConversionRule>;
	logger?: ConverterLogger;
}

function isHidden(node: ElementNode): boolean {
	return (
		getAttr(node, 'hidden') !== null ||
		getAttr(node, 'aria-hidden') === 'true' ||
		HIDDEN_STYLE.test(getAttr(node, 'style') || '')
	);
}

const paragraph: ConversionRule = (node, converter) => {
	const content = converter.convertChildren(node).trim();
	return content ? `${content}\n\n` : '';
};

const heading: ConversionRule = (node) => {
	const level = Number(node.tag.charAt(1));
	const content = collapsedText(node);
	return content ? `${'#'.repeat(level)} ${content}\n\n` : '';
};

function list(ordered: boolean): ConversionRule {
	return (node, converter) => {
		const items: string[] = [];

		elementChildren(node)
			.filter(byTag('li'))
			.forEach((item) => {
				const inline: RenderedNode[] = [];
				const nested: ElementNode[] = [];
				item.children.forEach((child) => {
					if (isElement(child) && (child.tag === 'ul' || child.tag === 'ol')) {
						nested.push(child);
					} else {
						inline.push(child);
					}
				});

				const content = inline
					.map((child) => converter.convertNode(child))
					.join('')
					.trim()
					.replace(/\n\s*\n/g, '\n');
				const sublists = nested
					.map((child) => converter.convertNode(child))
					.join('')
					.trim();
				if (!content && !sublists) {
					return;
				}

				const marker = ordered ? `${items.length + 1}.` : '-';
				const indent = ' '.repeat(marker.length + 1);
				let entry = `${marker} ${content.replace(/\n/g, `\n${indent}`)}`.trimEnd();
				if (sublists) {
					entry += `\n${prefixLines(sublists, indent)}`;
				}
				items.push(entry);
			});

		return items.length > 0 ? `${items.join('\n')}\n\n` : '';
	};
}

const preformatted: ConversionRule = (node) => {
	const svg = findFirst(node, isDiagramSvg);
	if (svg) {
		const notation = reconstructDiagram(svg);
		if (notation) {
			return fence('mermaid', notation);
		}
		return fence('', trimFencePadding(textContent(node)));
	}

	const code = findFirst(node, byTag('code'));
	const body = trimFencePadding(textContent(code ?? node));
	const language = extractLanguage(node, code) ?? detectCodeLanguage(body);
	return fence(language, body);
};

const vectorGraphic: ConversionRule = (node) => {
	if (isDiagramSvg(node)) {
		const notation = reconstructDiagram(node);
		if (notation) {
			return fence('mermaid', notation);
		}
	}
	const title = findFirst(node, byTag('title'));
	const description = firstNonEmpty([title ? collapsedText(title) : null, getAttr(node, 'aria-label')]);
	return description ? `[SVG: ${description}]\n\n` : '';
};

/**
 * Source links pointing at a line range (`…/main.ts#L10-L20`) are rewritten to
 * `main.ts(L10 - L20)`; the first word of the link text names the file.
 */
const link: ConversionRule = (node, converter) => {
	const href = getAttr(node, 'href') || '';
	let label = converter.convertChildren(node).trim();

	const citation = href.match(LINE_CITATION);
	if (citation && label) {
		const file = label.split(/\s+/)[0];
		label = citation[2]
			? `${file}(L${citation[1]} - L${citation[2]})`
			: `${file}(L${citation[1]})`;
	}

	return href ? `[${label}](${href})` : label;
};

const image: ConversionRule = (node) => {
	const src = getAttr(node, 'src') || '';
	const alt = getAttr(node, 'alt') || '';
	return src ? `![${alt}](${src})\n\n` : '';
};

const blockquote: ConversionRule = (node, converter) => {
	const content = converter.convertChildren(node).trim();
	return content ? `${prefixLines(content, '> ')}\n\n` : '';
};

function wrapInline(delimiter: string): ConversionRule {
	return (node, converter) => {
		const content = converter.convertChildren(node).trim();
		return content ? `${delimiter}${content}${delimiter}` : '';
	};
}

const inlineCode: ConversionRule = (node) => {
	const content = collapsedText(node);
	if (!content) {
		return '';
	}
	return content.includes('`') ? `\`\` ${content} \`\`` : `\`${content}\``;
};

function cellText(cell: ElementNode): string {
	return collapsedText(cell).replace(/\|/g, '\\|');
}

/**
 * Pipe table with the first row as header. Rows shorter than the header are
 * padded with empty cells.
 */
const table: ConversionRule = (node) => {
	const rows = findAll(node, byTag('tr')).map((row) =>
		elementChildren(row)
			.filter((cell) => cell.tag === 'th' || cell.tag === 'td')
			.map(cellText)
	);
	const header = rows[0];
	if (!header || header.length === 0) {
		return '';
	}

	const formatRow = (cells: string[]) => `| ${cells.join(' | ')} |`;
	const lines = [formatRow(header), formatRow(header.map(() => '---'))];
	rows.slice(1).forEach((cells) => {
		const padded = [...cells];
		while (padded.length < header.length) {
			padded.push('');
		}
		lines.push(formatRow(padded));
	});

	return `${lines.join('\n')}\n\n`;
};

const details: ConversionRule = (node, converter) => {
	const summary = elementChildren(node).find(byTag('summary'));
	const title = (summary ? converter.convertChildren(summary).trim() : '') || 'Details';
	const body = node.children
		.filter((child) => child !== summary)
		.map((child) => converter.convertNode(child))
		.join('')
		.trim();

	const lines = [`> **${title}**`];
	if (body) {
		lines.push(prefixLines(body, '> '));
	}
	return `${lines.join('\n')}\n\n`;
};

const fallback: ConversionRule = (node, converter) => {
	const content = converter.convertChildren(node);
	if (INLINE_TAGS.has(node.tag)) {
		return content;
	}
	return content.trim() ? `${content}\n\n` : '';
};

export const DEFAULT_RULES: Readonly<Record<string, ConversionRule>> = {
	p: paragraph,
	h1: heading,
	h2: heading,
	h3: heading,
	h4: heading,
	h5: heading,
	h6: heading,
	ul: list(false),
	ol: list(true),
	pre: preformatted,
	svg: vectorGraphic,
	a: link,
	img: image,
	blockquote,
	hr: () => '\n---\n\n',
	strong: wrapInline('**'),
	b: wrapInline('**'),
	em: wrapInline('_'),
	i: wrapInline('_'),
	code: inlineCode,
	br: () => '  \n',
	table,
	details,
};

// ---------------------------------------------------------------------------
// Converter
// ---------------------------------------------------------------------------

/**
 * Creates a converter over the default rule table plus any caller rules.
 *
 * A rule that throws does not stop the page: the node is replaced with an
 * `[ERROR_PROCESSING:<tag>]` marker, the error is logged, and conversion moves
 * on to the next sibling.
 */
export function createConverter(options: ConverterOptions = {}): Converter {
	const rules: Record<string, ConversionRule> = { ...DEFAULT_RULES, ...options.rules };
	const logger = options.logger ?? console;

	const converter: Converter = {
		convertNode(node) {
			if (node.kind === 'text') {
				return /^\s*\n\s*$/.test(node.text) ? '\n' : node.text;
			}
			if (SKIPPED_TAGS.has(node.tag) || isHidden(node)) {
				return '';
			}

			const rule = rules[node.tag] ?? fallback;
			try {
				return rule(node, converter);
			} catch (error) {
				logger.error(`Failed to convert ${node.tag} node:`, error);
				return `[ERROR_PROCESSING:${node.tag}]`;
			}
		},

		convertChildren(node) {
			return node.children.map((child) => converter.convertNode(child)).join('');
		},

		convertPage(root) {
			const blocks =
				root.kind === 'element'
					? root.children.map((child) => converter.convertNode(child))
					: [converter.convertNode(root)];
			return assembleDocument(blocks);
		},
	};

	return converter;
}

/**
 * Converts one rendered page into Markdown, with diagrams rebuilt as fenced
 * `mermaid` blocks.
 * @param root - The page's content container.
 */
export function convertPageToDocument(root: RenderedNode, options?: ConverterOptions): string {
	return createConverter(options).convertPage(root);
}
