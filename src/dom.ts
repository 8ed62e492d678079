import { Readability } from '@mozilla/readability';
import createDOMPurify from 'dompurify';
import { JSDOM } from 'jsdom';

import type { ConverterOptions } from './convert';
import { convertPageToDocument, firstNonEmpty } from './convert';
import type { RenderedNode } from './nodes';
import type { SiteConfig } from './rules';
import { defaultSiteConfigs, getSiteConfig } from './rules';

/**
 * Selectors that are removed from every page prior to conversion to eliminate common chrome.
 * Rendered diagrams are kept: they are rebuilt from their SVG later on.
 */
export const DEFAULT_REMOVE_SELECTORS = [
	'script, style, noscript, template',
	'header, footer, aside, nav',
	'.share, [aria-label*=share], [role=button][data-action*=share]',
	'.newsletter, .cookie, .banner, .modal',
];

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

export interface PageLink {
	title: string;
	url: string;
}

export interface ConvertHtmlOptions extends ConverterOptions {
	/** Address the page was captured from; selects the site rules. */
	url?: string;
	configs?: Readonly<Record<string, SiteConfig>>;
}

export interface ConvertedPage {
	title: string;
	markdown: string;
	links: PageLink[];
	/** Address of the page: its canonical link, else the URL it was converted with. */
	url: string | null;
	/** Text of the navigation link that points at this page. */
	sidebarTitle: string | null;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseHtml(html: string, url?: string): JSDOM {
	return new JSDOM(html, url ? { url } : {});
}

/**
 * Runs DOMPurify over captured markup. Diagram labels are HTML inside SVG
 * `foreignObject` elements, so the element is allowed and treated as a point
 * where HTML content may resume.
 * @param dom - Window provider for DOMPurify.
 * @param html - Markup to sanitise.
 */
export function sanitizeHtml(dom: JSDOM, html: string): string {
	const purify = createDOMPurify(dom.window);
	return purify.sanitize(html, {
		ADD_TAGS: ['foreignObject'],
		HTML_INTEGRATION_POINTS: { foreignobject: true },
	});
}

function resolveUrl(href: string, base: string): string {
	try {
		return new URL(href, base).href;
	} catch (_err) {
		return href;
	}
}

/**
 * Reads the address a saved page declares for itself through
 * `<link rel="canonical">` or `og:url`.
 */
export function canonicalUrl(dom: JSDOM): string | null {
	const doc = dom.window.document;
	const declared = firstNonEmpty([
		doc.querySelector('link[rel="canonical"]')?.getAttribute('href'),
		doc.querySelector('meta[property="og:url"]')?.getAttribute('content'),
	]);
	if (!declared) {
		return null;
	}
	const resolved = resolveUrl(declared, dom.window.location.href);
	return /^https?:/.test(resolved) ? resolved : null;
}

function isElementNode(node: Node): node is Element {
	return node.nodeType === ELEMENT_NODE;
}

/**
 * Maps a DOM subtree onto the rendered tree model. Comments and other node types
 * are dropped; element names are lower-cased.
 */
export function fromDom(node: Node): RenderedNode | null {
	if (node.nodeType === TEXT_NODE) {
		return { kind: 'text', text: node.textContent ?? '' };
	}
	if (!isElementNode(node)) {
		return null;
	}

	const attrs: Record<string, string> = {};
	Array.from(node.attributes).forEach((attribute) => {
		attrs[attribute.name] = attribute.value;
	});

	const children: RenderedNode[] = [];
	node.childNodes.forEach((child) => {
		const converted = fromDom(child);
		if (converted) {
			children.push(converted);
		}
	});

	return { kind: 'element', tag: node.localName.toLowerCase(), attrs, children };
}

// ---------------------------------------------------------------------------
// Article extraction
// ---------------------------------------------------------------------------

/**
 * Locates the page's content element: the first matching site selector, then
 * Readability's article, then `article, main`, then the body. The element may
 * belong to the live document; callers copy its markup before changing it.
 * @param dom - Parsed page.
 * @param hostname - Current page hostname for site config lookup.
 * @param configs - Merged site configurations keyed by hostname.
 */
export function getMainElement(
	dom: JSDOM,
	hostname: string,
	configs: Readonly<Record<string, SiteConfig>>
): Element {
	const doc = dom.window.document;
	const config = getSiteConfig(configs, hostname);

	for (const selector of config?.selectors ?? []) {
		const match = doc.querySelector(selector);
		if (match) {
			return match;
		}
	}

	// Diagram reconstruction reads the renderer's classes, so Readability must keep them.
	const article = new Readability(new JSDOM(dom.serialize()).window.document, {
		keepClasses: true,
	}).parse();
	if (article?.content) {
		const el = doc.createElement('div');
		el.innerHTML = sanitizeHtml(dom, article.content);
		return el;
	}

	return doc.querySelector('article, main') ?? doc.body;
}

/**
 * Strips page chrome and site-specific noise from the content element in place.
 * @param el - Root element to clean in-place.
 * @param removeSelectors - Site selectors to strip after the defaults.
 */
export function cleanContent(el: Element, removeSelectors: readonly string[]): void {
	[...DEFAULT_REMOVE_SELECTORS, ...removeSelectors].forEach((sel) => {
		el.querySelectorAll(sel).forEach((node) => {
			node.remove();
		});
	});
}

/**
 * Lists the wiki pages linked from the navigation sidebar: the first link of
 * every direct list item of each list, resolved against the page URL.
 * @param dom - Parsed page.
 * @param navigationSelector - Sidebar selector from the site config.
 * @param baseUrl - Address relative links resolve against; the document's own by default.
 */
export function collectPageLinks(
	dom: JSDOM,
	navigationSelector: string,
	baseUrl: string = dom.window.location.href
): PageLink[] {
	const sidebar = dom.window.document.querySelector(navigationSelector);
	if (!sidebar) {
		return [];
	}

	const links: PageLink[] = [];
	sidebar.querySelectorAll('ul').forEach((list) => {
		Array.from(list.children)
			.filter((item) => item.tagName === 'LI')
			.forEach((item) => {
				const anchor = item.querySelector('a[href]');
				const href = anchor?.getAttribute('href');
				if (!anchor || !href) {
					return;
				}
				links.push({
					title: (anchor.textContent ?? '').trim(),
					url: resolveUrl(href, baseUrl),
				});
			});
	});
	return links;
}

function comparableUrl(url: string): string {
	try {
		const parsed = new URL(url);
		return `${parsed.origin}${parsed.pathname.replace(/\/+$/, '')}`;
	} catch (_err) {
		return url;
	}
}

/**
 * Finds the title the navigation gives to the page at `url`. Query strings,
 * fragments and trailing slashes are ignored.
 */
export function findSidebarTitle(links: readonly PageLink[], url: string): string | null {
	const target = comparableUrl(url);
	const own = links.find((link) => comparableUrl(link.url) === target);
	return own?.title || null;
}

// ---------------------------------------------------------------------------
// High-level conversion pipeline
// ---------------------------------------------------------------------------

/**
 * Runs the full capture-to-Markdown pipeline on one saved page.
 * @param html - Rendered page markup.
 * @param options - Page address, site rules and converter options.
 */
export function convertHtmlToDocument(html: string, options: ConvertHtmlOptions = {}): ConvertedPage {
	const { url, configs = defaultSiteConfigs, ...converterOptions } = options;
	const dom = parseHtml(html, url);
	const address = canonicalUrl(dom) ?? url ?? null;
	const hostname = address ? new URL(address).hostname : '';
	const config = getSiteConfig(configs, hostname);

	const main = getMainElement(dom, hostname, configs);
	const container = dom.window.document.createElement('div');
	container.innerHTML = sanitizeHtml(dom, main.innerHTML);
	cleanContent(container, config?.remove ?? []);

	const root = fromDom(container);
	const markdown = root ? convertPageToDocument(root, converterOptions) : '';
	const links =
		config?.navigation ? collectPageLinks(dom, config.navigation, address ?? undefined) : [];

	return {
		title: dom.window.document.title.trim(),
		markdown,
		links,
		url: address,
		sidebarTitle: address ? findSidebarTitle(links, address) : null,
	};
}
