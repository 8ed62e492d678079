/**
 * A node of a scraped, fully rendered page. Text and elements only; comments and
 * processing instructions are dropped when the tree is built.
 */
export type RenderedNode = TextNode | ElementNode;

export interface TextNode {
	kind: 'text';
	text: string;
}

export interface ElementNode {
	kind: 'element';
	/** Lower-cased local name (`div`, `svg`, `foreignobject`). */
	tag: string;
	attrs: Readonly<Record<string, string>>;
	children: readonly RenderedNode[];
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function text(value: string): TextNode {
	return { kind: 'text', text: value };
}

/**
 * Builds an element node. Strings among the children become text nodes.
 * @param tag - Element name; lower-cased on the way in.
 */
export function element(
	tag: string,
	attrs: Record<string, string> = {},
	...children: Array<RenderedNode | string>
): ElementNode {
	return {
		kind: 'element',
		tag: tag.toLowerCase(),
		attrs,
		children: children.map((child) => (typeof child === 'string' ? text(child) : child)),
	};
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function isElement(node: RenderedNode): node is ElementNode {
	return node.kind === 'element';
}

export function getAttr(node: ElementNode, name: string): string | null {
	const value = node.attrs[name];
	return value === undefined ? null : value;
}

export function classList(node: ElementNode): string[] {
	return (getAttr(node, 'class') || '').split(/\s+/).filter(Boolean);
}

export function hasClass(node: ElementNode, name: string): boolean {
	return classList(node).includes(name);
}

/**
 * Case-insensitive substring match over the raw class attribute, for renderer
 * classes that come in several spellings (`actor`, `actor-top`, `messageLine0`).
 */
export function classIncludes(node: ElementNode, fragment: string): boolean {
	return (getAttr(node, 'class') || '').toLowerCase().includes(fragment.toLowerCase());
}

export function elementChildren(node: ElementNode): ElementNode[] {
	return node.children.filter(isElement);
}

/**
 * Collects every descendant element matching the predicate, in document order.
 * The starting node itself is not tested.
 */
export function findAll(node: ElementNode, predicate: (el: ElementNode) => boolean): ElementNode[] {
	const found: ElementNode[] = [];
	const visit = (current: ElementNode) => {
		for (const child of current.children) {
			if (!isElement(child)) {
				continue;
			}
			if (predicate(child)) {
				found.push(child);
			}
			visit(child);
		}
	};
	visit(node);
	return found;
}

export function findFirst(
	node: ElementNode,
	predicate: (el: ElementNode) => boolean
): ElementNode | null {
	for (const child of node.children) {
		if (!isElement(child)) {
			continue;
		}
		if (predicate(child)) {
			return child;
		}
		const nested = findFirst(child, predicate);
		if (nested) {
			return nested;
		}
	}
	return null;
}

export function byTag(tag: string): (el: ElementNode) => boolean {
	return (el) => el.tag === tag;
}

/**
 * Concatenates all descendant text, unmodified.
 */
export function textContent(node: RenderedNode): string {
	if (node.kind === 'text') {
		return node.text;
	}
	return node.children.map(textContent).join('');
}

/**
 * Text content with whitespace runs collapsed to single spaces and trimmed.
 */
export function collapsedText(node: RenderedNode): string {
	return textContent(node).replace(/\s+/g, ' ').trim();
}
