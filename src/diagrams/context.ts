import type { ElementNode } from '../nodes';
import { collapsedText, findFirst, hasClass } from '../nodes';

/**
 * Working state of one reconstruction call. Created per diagram and dropped
 * once its notation has been emitted; nothing survives between diagrams.
 */
export interface ReconstructionContext {
	/** Text shapes already claimed by a message, edge or participant. */
	consumed: Set<ElementNode>;
	/** Counter behind generated ids for shapes that carry none. */
	nextGeneratedId: number;
}

export function createContext(): ReconstructionContext {
	return { consumed: new Set(), nextGeneratedId: 1 };
}

export function generateId(context: ReconstructionContext, prefix: string): string {
	const id = `${prefix}_${context.nextGeneratedId}`;
	context.nextGeneratedId += 1;
	return id;
}

/**
 * Normalizes label text for a double-quoted Mermaid string.
 */
export function quoteSafe(value: string): string {
	return value.replace(/\s+/g, ' ').trim().replace(/"/g, "'");
}

/**
 * Reads the visible label of a rendered shape. HTML labels live in a
 * `foreignObject` under the label group; plain SVG labels are `text` elements.
 * @param labelClass - Class of the label group inside the shape.
 */
export function shapeLabel(shape: ElementNode, labelClass = 'label'): string {
	const label = findFirst(shape, (el) => hasClass(el, labelClass)) ?? shape;
	const foreign = findFirst(label, (el) => el.tag === 'foreignobject');
	const html = foreign ? findFirst(foreign, (el) => el.tag === 'div' || el.tag === 'span') : null;
	return quoteSafe(collapsedText(html ?? label));
}

export function isDiagramSvg(el: ElementNode): boolean {
	return el.tag === 'svg' && (el.attrs.id ?? '').startsWith('mermaid-');
}
