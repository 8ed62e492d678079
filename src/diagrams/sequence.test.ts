import { describe, expect, it } from 'vitest';

import type { ElementNode } from '../nodes';
import { element } from '../nodes';
import { createContext } from './context';
import { extractParticipants, reconstructSequence, renderSequence } from './sequence';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function actor(name: string, centre: number, y = 0): ElementNode {
	return element(
		'g',
		{},
		element('rect', {
			class: 'actor actor-top',
			x: String(centre - 40),
			y: String(y),
			width: '80',
			height: '30',
		}),
		element(
			'text',
			{ class: 'actor actor-box', x: String(centre), y: String(y + 15) },
			element('tspan', {}, name)
		)
	);
}

function message(x1: number, x2: number, y: number): ElementNode {
	return element('line', {
		class: 'messageLine0',
		x1: String(x1),
		y1: String(y),
		x2: String(x2),
		y2: String(y),
	});
}

function label(value: string, x: number, y: number, className = 'messageText'): ElementNode {
	return element('text', { class: className, x: String(x), y: String(y) }, value);
}

function svg(...children: ElementNode[]): ElementNode {
	return element('svg', { id: 'mermaid-2', 'aria-roledescription': 'sequence' }, ...children);
}

// ---------------------------------------------------------------------------
// Reconstruction
// ---------------------------------------------------------------------------

describe('reconstructSequence', () => {
	it('orders participants left to right', () => {
		const diagram = svg(actor('Client', 10), actor('Server', 50), actor('Cache', 30));

		expect(reconstructSequence(diagram)).toBe(
			[
				'sequenceDiagram',
				'    participant Client',
				'    participant Cache',
				'    participant Server',
			].join('\n')
		);
	});

	it('pairs messages with their labels and keeps leftover text as notes', () => {
		const diagram = svg(
			actor('Alice', 100),
			actor('Bob', 300),
			message(100, 300, 80),
			label('Hello', 200, 70),
			message(300, 100, 150),
			label('Hi back', 200, 140),
			label('Thinking', 100, 110, 'noteText'),
			actor('Alice', 100, 500),
			actor('Bob', 300, 500)
		);

		expect(reconstructSequence(diagram)).toBe(
			[
				'sequenceDiagram',
				'    participant Alice',
				'    participant Bob',
				'    Alice->>Bob: Hello',
				'    note over Alice: Thinking',
				'    Bob->>Alice: Hi back',
			].join('\n')
		);
	});

	it('reads the ends of curved message paths', () => {
		const diagram = svg(
			actor('Alice', 100),
			actor('Bob', 300),
			element('path', { class: 'messageLine1', d: 'M300,200 C250,180 150,180 100,200' })
		);

		expect(reconstructSequence(diagram)).toBe(
			['sequenceDiagram', '    participant Alice', '    participant Bob', '    Bob->>Alice:'].join('\n')
		);
	});

	it('skips arrows whose coordinates cannot be read', () => {
		const diagram = svg(
			actor('Alice', 100),
			element('line', { class: 'messageLine0', x1: 'a', y1: '0', x2: '10', y2: '0' })
		);

		expect(reconstructSequence(diagram)).toBe('sequenceDiagram\n    participant Alice');
	});

	it('returns null without participants', () => {
		expect(reconstructSequence(svg(message(0, 10, 10), label('orphan', 5, 5)))).toBeNull();
	});
});

// ---------------------------------------------------------------------------
// Parts
// ---------------------------------------------------------------------------

describe('extractParticipants', () => {
	it('merges repeated drawings and consumes their texts', () => {
		const top = actor('Alice', 100);
		const bottom = actor('Alice', 100, 500);
		const context = createContext();

		expect(extractParticipants(svg(top, bottom), context)).toEqual([{ name: 'Alice', x: 100 }]);
		expect(context.consumed.size).toBe(2);
	});

	it('keeps the leftmost drawing of a repeated name', () => {
		const participants = extractParticipants(
			svg(actor('Alice', 300), actor('Bob', 200), actor('Alice', 100, 500)),
			createContext()
		);

		expect(participants).toEqual([
			{ name: 'Alice', x: 100 },
			{ name: 'Bob', x: 200 },
		]);
	});

	it('prefers a text with the label class', () => {
		const group = element(
			'g',
			{},
			element('rect', { class: 'actor', x: '0', y: '0', width: '20', height: '10' }),
			element('text', { x: '10', y: '5' }, 'ignored'),
			element('text', { class: 'label', x: '10', y: '5' }, 'Named')
		);

		expect(extractParticipants(svg(group), createContext())).toEqual([{ name: 'Named', x: 10 }]);
	});
});

describe('renderSequence', () => {
	it('keeps the drawing order of elements at the same height', () => {
		const notation = renderSequence(
			[{ name: 'A', x: 0 }],
			[
				{ kind: 'note', participant: 'A', text: 'first', y: 10 },
				{ kind: 'note', participant: 'A', text: 'second', y: 10 },
			]
		);

		expect(notation.split('\n').slice(2)).toEqual(['    note over A: first', '    note over A: second']);
	});
});
