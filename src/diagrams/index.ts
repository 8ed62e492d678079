import type { ElementNode } from '../nodes';
import { getAttr } from '../nodes';
import { isDiagramSvg } from './context';
import { reconstructFlowchart } from './flowchart';
import { reconstructSequence } from './sequence';
import { reconstructState } from './state';

export type DiagramKind = 'flowchart' | 'class' | 'sequence' | 'state';

/**
 * Role-description fragments in the order they are checked. `class` precedes
 * `sequence` and `stateDiagram` so that `classDiagram` never reaches them.
 */
const KIND_MARKERS: ReadonlyArray<[string, DiagramKind]> = [
	['flowchart', 'flowchart'],
	['class', 'class'],
	['sequence', 'sequence'],
	['stateDiagram', 'state'],
];

export function diagramKindOf(svg: ElementNode): DiagramKind | null {
	if (!isDiagramSvg(svg)) {
		return null;
	}
	const role = getAttr(svg, 'aria-roledescription') || '';
	const marker = KIND_MARKERS.find(([fragment]) => role.includes(fragment));
	return marker ? marker[1] : null;
}

/**
 * Class diagrams are not reconstructed: member and relationship geometry is
 * left to the fallback path.
 */
export function reconstructClass(_svg: ElementNode): string | null {
	return null;
}

const RECONSTRUCTORS: Record<DiagramKind, (svg: ElementNode) => string | null> = {
	flowchart: reconstructFlowchart,
	class: reconstructClass,
	sequence: reconstructSequence,
	state: reconstructState,
};

/**
 * Reconstructs notation for any supported diagram SVG.
 * @returns null for non-diagrams, unsupported kinds and empty reconstructions.
 */
export function reconstructDiagram(svg: ElementNode): string | null {
	const kind = diagramKindOf(svg);
	return kind ? RECONSTRUCTORS[kind](svg) : null;
}

export { isDiagramSvg } from './context';
export { reconstructFlowchart } from './flowchart';
export { reconstructSequence } from './sequence';
export { reconstructState } from './state';
