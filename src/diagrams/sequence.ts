import type { Point } from '../geometry';
import { nearest, parseNumber, parsePathPoints, weightedDistance } from '../geometry';
import type { ElementNode } from '../nodes';
import {
	byTag,
	classIncludes,
	collapsedText,
	elementChildren,
	findAll,
	findFirst,
	getAttr,
	hasClass,
} from '../nodes';
import type { ReconstructionContext } from './context';
import { createContext } from './context';

export interface Participant {
	name: string;
	x: number;
}

export type SequenceElement =
	| { kind: 'message'; sender: string; receiver: string; text: string; y: number }
	| { kind: 'note'; participant: string; text: string; y: number };

interface TextShape {
	el: ElementNode;
	at: Point;
	text: string;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Finds actor boxes (a group with a direct `rect.actor*` child) and names them
 * after the group's label text. Actors are drawn at the top and again at the
 * bottom of the diagram; each name keeps its leftmost drawing.
 */
export function extractParticipants(
	svg: ElementNode,
	context: ReconstructionContext
): Participant[] {
	const participants = new Map<string, Participant>();

	for (const group of findAll(svg, byTag('g'))) {
		const rect = elementChildren(group).find(
			(child) => child.tag === 'rect' && classIncludes(child, 'actor')
		);
		if (!rect) {
			continue;
		}
		const label =
			findFirst(group, (el) => el.tag === 'text' && hasClass(el, 'label')) ??
			findFirst(group, byTag('text'));
		if (!label) {
			continue;
		}
		findAll(group, byTag('text')).forEach((el) => context.consumed.add(el));

		const left = parseNumber(getAttr(rect, 'x'));
		const width = parseNumber(getAttr(rect, 'width'));
		const name = collapsedText(label);
		if (left === null || width === null || !name) {
			continue;
		}
		const x = left + width / 2;
		const known = participants.get(name);
		if (!known || x < known.x) {
			participants.set(name, { name, x });
		}
	}

	return [...participants.values()];
}

function collectTexts(svg: ElementNode, context: ReconstructionContext): TextShape[] {
	const texts: TextShape[] = [];
	for (const el of findAll(svg, byTag('text'))) {
		if (context.consumed.has(el)) {
			continue;
		}
		const x = parseNumber(getAttr(el, 'x'));
		const y = parseNumber(getAttr(el, 'y'));
		const value = collapsedText(el);
		if (x === null || y === null || !value) {
			continue;
		}
		texts.push({ el, at: { x, y }, text: value });
	}
	return texts;
}

function endpointsOf(shape: ElementNode): [Point, Point] | null {
	if (shape.tag === 'line') {
		const x1 = parseNumber(getAttr(shape, 'x1'));
		const y1 = parseNumber(getAttr(shape, 'y1'));
		const x2 = parseNumber(getAttr(shape, 'x2'));
		const y2 = parseNumber(getAttr(shape, 'y2'));
		if (x1 === null || y1 === null || x2 === null || y2 === null) {
			return null;
		}
		return [
			{ x: x1, y: y1 },
			{ x: x2, y: y2 },
		];
	}

	const points = parsePathPoints(getAttr(shape, 'd'));
	const first = points[0];
	const last = points[points.length - 1];
	return first && last ? [first, last] : null;
}

function closestParticipant(participants: readonly Participant[], x: number): Participant | null {
	return nearest({ x, y: 0 }, participants, (point, participant) => Math.abs(participant.x - point.x));
}

/**
 * Turns message arrows into messages between the nearest participants, paired
 * with the closest unused text. Texts left over become notes.
 */
export function extractElements(
	svg: ElementNode,
	participants: readonly Participant[],
	context: ReconstructionContext
): SequenceElement[] {
	const texts = collectTexts(svg, context);
	const elements: SequenceElement[] = [];

	const arrows = findAll(
		svg,
		(el) => (el.tag === 'line' || el.tag === 'path') && classIncludes(el, 'message')
	);
	for (const arrow of arrows) {
		const ends = endpointsOf(arrow);
		if (!ends) {
			continue;
		}
		const [start, end] = ends;
		const sender = closestParticipant(participants, start.x);
		const receiver = closestParticipant(participants, end.x);
		if (!sender || !receiver) {
			continue;
		}

		const middle = { x: (start.x + end.x) / 2, y: (start.y + end.y) / 2 };
		const available = texts.filter((shape) => !context.consumed.has(shape.el));
		const label = nearest(middle, available, (point, shape) => weightedDistance(shape.at, point));
		if (label) {
			context.consumed.add(label.el);
		}

		elements.push({
			kind: 'message',
			sender: sender.name,
			receiver: receiver.name,
			text: label ? label.text : '',
			y: middle.y,
		});
	}

	for (const shape of texts) {
		if (context.consumed.has(shape.el)) {
			continue;
		}
		const anchor = closestParticipant(participants, shape.at.x);
		if (!anchor) {
			continue;
		}
		context.consumed.add(shape.el);
		elements.push({ kind: 'note', participant: anchor.name, text: shape.text, y: shape.at.y });
	}

	return elements;
}

// ---------------------------------------------------------------------------
// Emission
// ---------------------------------------------------------------------------

function elementLine(item: SequenceElement): string {
	if (item.kind === 'note') {
		return `note over ${item.participant}: ${item.text}`;
	}
	return `${item.sender}->>${item.receiver}: ${item.text}`.trimEnd();
}

export function renderSequence(
	participants: readonly Participant[],
	elements: readonly SequenceElement[]
): string {
	const lines = ['sequenceDiagram'];
	[...participants]
		.sort((a, b) => a.x - b.x)
		.forEach((participant) => lines.push(`    participant ${participant.name}`));
	[...elements]
		.sort((a, b) => a.y - b.y)
		.forEach((item) => lines.push(`    ${elementLine(item)}`));
	return lines.join('\n');
}

/**
 * Rebuilds sequence notation from a rendered sequence SVG.
 * @returns The notation, or null when no participant could be found.
 */
export function reconstructSequence(svg: ElementNode): string | null {
	const context = createContext();
	const participants = extractParticipants(svg, context);
	if (participants.length === 0) {
		return null;
	}
	const elements = extractElements(svg, participants, context);
	return renderSequence(participants, elements);
}
