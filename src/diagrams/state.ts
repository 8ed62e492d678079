import type { Point } from '../geometry';
import { euclidean, midpoint, nearest, parsePathPoints, parseTranslate } from '../geometry';
import { canonicalStateId } from '../identifiers';
import type { ElementNode } from '../nodes';
import { classIncludes, collapsedText, findAll, getAttr, hasClass } from '../nodes';

/** Farthest a transition label may sit from its transition's midpoint. */
export const LABEL_PROXIMITY = 75;

export type StateRole = 'state' | 'start' | 'end';

export interface StateShape {
	id: string;
	role: StateRole;
	at: Point;
}

export interface Transition {
	source: StateShape;
	target: StateShape;
	middle: Point | null;
	label?: string;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

function roleOf(rawId: string): StateRole {
	if (rawId.includes('_start')) {
		return 'start';
	}
	if (rawId.includes('_end')) {
		return 'end';
	}
	return 'state';
}

/**
 * Collects state shapes by their centre. The start and end pseudo-states look
 * alike once drawn, so they are told apart by their id alone.
 */
export function extractStates(svg: ElementNode): StateShape[] {
	const states: StateShape[] = [];
	const seen = new Set<string>();

	for (const shape of findAll(svg, (el) => el.tag === 'g' && hasClass(el, 'node'))) {
		const rawId = getAttr(shape, 'id') || '';
		const id = canonicalStateId(rawId);
		const at = parseTranslate(getAttr(shape, 'transform'));
		if (!id || !at || seen.has(id)) {
			continue;
		}
		seen.add(id);
		states.push({ id, role: roleOf(rawId), at });
	}

	return states;
}

export function extractTransitions(svg: ElementNode, states: readonly StateShape[]): Transition[] {
	const transitions: Transition[] = [];

	for (const path of findAll(svg, (el) => el.tag === 'path' && classIncludes(el, 'transition'))) {
		const points = parsePathPoints(getAttr(path, 'd'));
		const first = points[0];
		const last = points[points.length - 1];
		if (!first || !last) {
			continue;
		}
		const source = nearest(first, states, (point, state) => euclidean(point, state.at));
		const target = nearest(last, states, (point, state) => euclidean(point, state.at));
		if (!source || !target) {
			continue;
		}
		transitions.push({ source, target, middle: midpoint(points) });
	}

	return transitions;
}

/**
 * Attaches each floating edge label to the closest transition that is still
 * unlabelled, provided it lies within {@link LABEL_PROXIMITY}.
 */
export function attachLabels(svg: ElementNode, transitions: readonly Transition[]): void {
	for (const label of findAll(svg, (el) => el.tag === 'g' && hasClass(el, 'edgeLabel'))) {
		const value = collapsedText(label);
		const at = parseTranslate(getAttr(label, 'transform'));
		if (!value || !at) {
			continue;
		}
		const open = transitions.filter(
			(transition): transition is Transition & { middle: Point } =>
				!transition.label && transition.middle !== null
		);
		const closest = nearest(at, open, (point, transition) => euclidean(point, transition.middle));
		if (closest && euclidean(at, closest.middle) <= LABEL_PROXIMITY) {
			closest.label = value;
		}
	}
}

// ---------------------------------------------------------------------------
// Emission
// ---------------------------------------------------------------------------

function endpoint(state: StateShape): string {
	return state.role === 'state' ? state.id : '[*]';
}

export function renderState(states: readonly StateShape[], transitions: readonly Transition[]): string {
	const lines = ['stateDiagram-v2'];
	const emitted = new Set<string>();
	const connected = new Set<string>();

	for (const transition of transitions) {
		connected.add(transition.source.id);
		connected.add(transition.target.id);
		const arrow = `${endpoint(transition.source)} --> ${endpoint(transition.target)}`;
		const line = transition.label ? `${arrow} : ${transition.label}` : arrow;
		if (!emitted.has(line)) {
			emitted.add(line);
			lines.push(`    ${line}`);
		}
	}

	states
		.filter((state) => state.role === 'state' && !connected.has(state.id))
		.forEach((state) => lines.push(`    ${state.id}`));

	return lines.join('\n');
}

/**
 * Rebuilds state notation from a rendered state SVG.
 * @returns The notation, or null when no regular state was found.
 */
export function reconstructState(svg: ElementNode): string | null {
	const states = extractStates(svg);
	if (!states.some((state) => state.role === 'state')) {
		return null;
	}
	const transitions = extractTransitions(svg, states);
	attachLabels(svg, transitions);
	return renderState(states, transitions);
}
