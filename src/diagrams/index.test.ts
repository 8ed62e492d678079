import { describe, expect, it } from 'vitest';

import { element } from '../nodes';
import { diagramKindOf, reconstructDiagram } from './index';

function diagram(role: string, id = 'mermaid-9') {
	return element(
		'svg',
		{ id, 'aria-roledescription': role },
		element(
			'g',
			{ class: 'node', id: 'flowchart-A-0', transform: 'translate(0, 0)' },
			element('text', {}, 'A')
		)
	);
}

describe('diagramKindOf', () => {
	it.each([
		['flowchart-v2', 'flowchart'],
		['classDiagram', 'class'],
		['sequence', 'sequence'],
		['stateDiagram', 'state'],
	])('reads %s as %s', (role, kind) => {
		expect(diagramKindOf(diagram(role))).toBe(kind);
	});

	it('ignores unknown roles and foreign svgs', () => {
		expect(diagramKindOf(diagram('pie'))).toBeNull();
		expect(diagramKindOf(diagram('flowchart-v2', 'logo'))).toBeNull();
		expect(diagramKindOf(element('div', { id: 'mermaid-1' }))).toBeNull();
	});
});

describe('reconstructDiagram', () => {
	it('dispatches on the diagram kind', () => {
		expect(reconstructDiagram(diagram('flowchart-v2'))).toBe('flowchart TD\n    A["A"]');
	});

	it('leaves class diagrams unreconstructed', () => {
		expect(reconstructDiagram(diagram('classDiagram'))).toBeNull();
	});

	it('returns null for svgs that are not diagrams', () => {
		expect(reconstructDiagram(diagram('flowchart-v2', 'icon'))).toBeNull();
	});
});
