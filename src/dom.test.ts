import type { JSDOM } from 'jsdom';
import { describe, expect, it } from 'vitest';

import {
	canonicalUrl,
	cleanContent,
	collectPageLinks,
	convertHtmlToDocument,
	findSidebarTitle,
	fromDom,
	getMainElement,
	parseHtml,
	sanitizeHtml,
} from './dom';
import type { SiteConfig } from './rules';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function select(dom: JSDOM, selector: string): Element {
	const el = dom.window.document.querySelector(selector);
	if (!el) {
		throw new Error(`No element matches ${selector}`);
	}
	return el;
}

function htmlLabel(value: string): string {
	return `<foreignObject width="60" height="20"><div><span class="nodeLabel"><p>${value}</p></span></div></foreignObject>`;
}

function flowNode(id: string, x: number, value: string): string {
	return `<g class="node default" id="flowchart-${id}-0" transform="translate(${x}, 50)"><rect width="60" height="20"></rect><g class="label">${htmlLabel(value)}</g></g>`;
}

/** A flowchart as the renderer draws it, labels as HTML. */
const renderedFlowchart = [
	'<svg id="mermaid-1" aria-roledescription="flowchart-v2">',
	'<g class="root">',
	'<g class="clusters"><g class="cluster default" id="Core">',
	'<rect x="0" y="0" width="200" height="100"></rect>',
	`<g class="cluster-label">${htmlLabel('Core')}</g>`,
	'</g></g>',
	'<g class="edgePaths"><path class="flowchart-link" id="L_A_B_0" d="M50,50L150,50"></path></g>',
	'<g class="edgeLabels"><g class="edgeLabel" transform="translate(100, 50)">',
	`<g class="label" data-id="L_A_B_0">${htmlLabel('calls')}</g>`,
	'</g></g>',
	'<g class="nodes">',
	flowNode('A', 50, 'Alpha'),
	flowNode('B', 150, 'Beta'),
	flowNode('C', 400, 'Gamma'),
	'</g>',
	'</g>',
	'</svg>',
].join('');

const renderedNotation = [
	'```mermaid',
	'flowchart TD',
	'    subgraph Core["Core"]',
	'        A["Alpha"]',
	'        B["Beta"]',
	'    end',
	'    C["Gamma"]',
	'',
	'    A -->|"calls"| B',
	'```',
].join('\n');

const configs: Record<string, SiteConfig> = {
	'wiki.test': { selectors: ['.missing', '#content'], remove: ['.ads'], navigation: '.side' },
};

// ---------------------------------------------------------------------------
// Tree mapping
// ---------------------------------------------------------------------------

describe('fromDom', () => {
	it('maps elements and text, dropping comments', () => {
		const dom = parseHtml('<div id="x"><!-- note --><P class="a">Hi</P></div>');

		expect(fromDom(select(dom, '#x'))).toEqual({
			kind: 'element',
			tag: 'div',
			attrs: { id: 'x' },
			children: [
				{
					kind: 'element',
					tag: 'p',
					attrs: { class: 'a' },
					children: [{ kind: 'text', text: 'Hi' }],
				},
			],
		});
	});

	it('lower-cases svg element names', () => {
		const dom = parseHtml('<svg id="s"><foreignObject></foreignObject></svg>');
		const svg = fromDom(select(dom, '#s'));

		expect(svg?.kind === 'element' ? svg.children : []).toEqual([
			{ kind: 'element', tag: 'foreignobject', attrs: {}, children: [] },
		]);
	});
});

// ---------------------------------------------------------------------------
// Page handling
// ---------------------------------------------------------------------------

describe('sanitizeHtml', () => {
	it('keeps HTML labels inside foreignObject', () => {
		const dom = parseHtml('');
		const clean = sanitizeHtml(
			dom,
			`<svg><g class="label">${htmlLabel('Alpha')}</g><script>alert(1)</script></svg>`
		);
		const view = parseHtml(clean);

		expect(view.window.document.querySelector('svg p')?.textContent).toBe('Alpha');
		expect(view.window.document.querySelector('script')).toBeNull();
	});
});

describe('canonicalUrl', () => {
	it('reads the canonical link, then og:url', () => {
		const linked = parseHtml(
			'<head><link rel="canonical" href="https://wiki.test/w/a"><meta property="og:url" content="https://wiki.test/w/b"></head>'
		);
		const og = parseHtml('<head><meta property="og:url" content="https://wiki.test/w/b"></head>');

		expect(canonicalUrl(linked)).toBe('https://wiki.test/w/a');
		expect(canonicalUrl(og)).toBe('https://wiki.test/w/b');
	});

	it('resolves a relative link against the page address', () => {
		const dom = parseHtml('<head><link rel="canonical" href="/w/a"></head>', 'https://wiki.test/w/saved');
		expect(canonicalUrl(dom)).toBe('https://wiki.test/w/a');
	});

	it('ignores links that do not resolve to a web address', () => {
		expect(canonicalUrl(parseHtml('<head><link rel="canonical" href="/w/a"></head>'))).toBeNull();
		expect(canonicalUrl(parseHtml('<p>none</p>'))).toBeNull();
	});
});

describe('findSidebarTitle', () => {
	const links = [
		{ title: 'Intro', url: 'https://wiki.test/w/intro/' },
		{ title: 'Setup', url: 'https://wiki.test/w/setup' },
	];

	it('matches ignoring query, fragment and trailing slash', () => {
		expect(findSidebarTitle(links, 'https://wiki.test/w/intro?tab=1#top')).toBe('Intro');
		expect(findSidebarTitle(links, 'https://wiki.test/w/setup/')).toBe('Setup');
	});

	it('returns null when no link points at the page', () => {
		expect(findSidebarTitle(links, 'https://wiki.test/w/other')).toBeNull();
	});
});

describe('getMainElement', () => {
	it('uses the first site selector that matches, ignoring www', () => {
		const dom = parseHtml('<body><div id="content">Body</div></body>');
		expect(getMainElement(dom, 'www.wiki.test', configs).id).toBe('content');
	});
});

describe('cleanContent', () => {
	it('removes page chrome and site selectors', () => {
		const dom = parseHtml(
			'<div id="c"><header>Top</header><p>Keep</p><div class="cookie">Consent</div><span class="ads">Buy</span></div>'
		);
		const el = select(dom, '#c');
		cleanContent(el, ['.ads']);

		expect(el.innerHTML).toBe('<p>Keep</p>');
	});
});

describe('collectPageLinks', () => {
	it('takes the first link of each list item and resolves it', () => {
		const dom = parseHtml(
			[
				'<aside class="side"><ul>',
				'<li><a href="/w/intro">Intro</a><a href="/w/skip">Skip</a></li>',
				'<li><a href="https://other.test/x"> Other </a></li>',
				'<li>No link</li>',
				'</ul></aside>',
			].join(''),
			'https://wiki.test/w/page'
		);

		expect(collectPageLinks(dom, '.side')).toEqual([
			{ title: 'Intro', url: 'https://wiki.test/w/intro' },
			{ title: 'Other', url: 'https://other.test/x' },
		]);
	});

	it('resolves against an explicit base address', () => {
		const dom = parseHtml('<div class="side"><ul><li><a href="b">B</a></li></ul></div>');

		expect(collectPageLinks(dom, '.side', 'https://wiki.test/w/a')).toEqual([
			{ title: 'B', url: 'https://wiki.test/w/b' },
		]);
	});

	it('returns nothing when the sidebar is missing', () => {
		expect(collectPageLinks(parseHtml('<p>x</p>'), '.side')).toEqual([]);
	});
});

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

describe('convertHtmlToDocument', () => {
	const html = [
		'<html><head><title> Wiki Page </title></head><body>',
		'<nav class="side"><ul><li><a href="/w/intro">Intro</a></li></ul></nav>',
		'<div id="content">',
		'<h1>Overview</h1>',
		'<p>Text with <a href="/w/intro">link</a>.</p>',
		'<div class="ads">Buy</div>',
		'<script>var tracked = true;</script>',
		'<pre><svg id="mermaid-7" aria-roledescription="flowchart-v2">',
		'<g class="node" id="flowchart-A-0" transform="translate(0,0)"><g class="label"><text>Go</text></g></g>',
		'</svg></pre>',
		'</div>',
		'</body></html>',
	].join('');

	it('converts the content container and lists navigation links', () => {
		const page = convertHtmlToDocument(html, { url: 'https://wiki.test/w/page', configs });

		expect(page.title).toBe('Wiki Page');
		expect(page.markdown).toBe(
			[
				'# Overview',
				'',
				'Text with [link](/w/intro).',
				'',
				'```mermaid',
				'flowchart TD',
				'    A["Go"]',
				'```',
			].join('\n')
		);
		expect(page.links).toEqual([{ title: 'Intro', url: 'https://wiki.test/w/intro' }]);
	});

	it('names the page after its navigation entry', () => {
		const page = convertHtmlToDocument(html, { url: 'https://wiki.test/w/intro', configs });

		expect(page.url).toBe('https://wiki.test/w/intro');
		expect(page.sidebarTitle).toBe('Intro');
	});

	it('prefers the canonical address of the page', () => {
		const canonical = html.replace(
			'</title>',
			'</title><link rel="canonical" href="https://wiki.test/w/intro">'
		);
		const page = convertHtmlToDocument(canonical, { url: 'https://wiki.test/w/saved', configs });

		expect(page.url).toBe('https://wiki.test/w/intro');
		expect(page.sidebarTitle).toBe('Intro');
	});

	it('rebuilds a diagram with HTML labels under the default rules', () => {
		const page = convertHtmlToDocument(
			[
				'<html><head><title>Overview</title></head><body>',
				'<div class="container">',
				'<div class="border-r-border"><ul>',
				'<li><a href="/org/repo/1-overview">Overview</a></li>',
				'<li><a href="/org/repo/2-design">Design</a></li>',
				'</ul></div>',
				`<div><div class="prose">${renderedFlowchart}</div></div>`,
				'</div>',
				'</body></html>',
			].join(''),
			{ url: 'https://deepwiki.com/org/repo/1-overview' }
		);

		expect(page.markdown).toBe(renderedNotation);
		expect(page.sidebarTitle).toBe('Overview');
		expect(page.links).toEqual([
			{ title: 'Overview', url: 'https://deepwiki.com/org/repo/1-overview' },
			{ title: 'Design', url: 'https://deepwiki.com/org/repo/2-design' },
		]);
	});

	it('keeps diagram classes when the article comes from Readability', () => {
		const paragraph =
			'<p>This paragraph describes how requests move through the service, which parts handle them, and what each of those parts returns to the caller.</p>';
		const svg = [
			'<svg id="mermaid-3" aria-roledescription="flowchart-v2">',
			'<path class="flowchart-link" id="L_A_B_0" d="M0,0L100,0"></path>',
			'<g class="node" id="flowchart-A-0" transform="translate(0,0)"><g class="label"><text>Alpha</text></g></g>',
			'<g class="node" id="flowchart-B-1" transform="translate(100,0)"><g class="label"><text>Beta</text></g></g>',
			'</svg>',
		].join('');
		const page = convertHtmlToDocument(
			[
				'<html><head><title>Plain</title></head><body><article>',
				paragraph.repeat(4),
				`<pre>${svg}</pre>`,
				paragraph,
				'</article></body></html>',
			].join(''),
			{ url: 'https://plain.test/o/r' }
		);

		expect(page.markdown).toContain(
			['```mermaid', 'flowchart TD', '    A["Alpha"]', '    B["Beta"]', '', '    A --> B', '```'].join('\n')
		);
		expect(page.links).toEqual([]);
		expect(page.sidebarTitle).toBeNull();
	});
});
