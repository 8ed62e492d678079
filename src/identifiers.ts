export const NODE_ID_PREFIX = 'flowchart-';
export const STATE_ID_PREFIX = 'state-';
export const EDGE_ID_PREFIX = 'L_';

/**
 * Recovers a flowchart node's source id from its rendered id
 * (`flowchart-Build-3` → `Build`).
 * @returns null for ids the renderer did not generate for a node.
 */
export function canonicalNodeId(rawId: string): string | null {
	if (!rawId.startsWith(NODE_ID_PREFIX)) {
		return null;
	}
	const id = rawId.slice(NODE_ID_PREFIX.length).replace(/-\d+$/, '');
	return id || null;
}

/**
 * Recovers a state's name from its rendered id (`state-Idle-2` → `Idle`).
 * Ids without the prefix are kept as they are, minus the counter.
 */
export function canonicalStateId(rawId: string): string | null {
	const stripped = rawId.startsWith(STATE_ID_PREFIX)
		? rawId.slice(STATE_ID_PREFIX.length)
		: rawId;
	const id = stripped.replace(/-\d+$/, '');
	return id || null;
}

/**
 * Matches one half of a split edge id against the known ids once its trailing
 * `_<digits>` counter is removed.
 */
function resolveHalf(half: string, knownIds: ReadonlySet<string>): string | null {
	const candidate = half.replace(/_\d+$/, '');
	return candidate && knownIds.has(candidate) ? candidate : null;
}

export interface ResolvedEdge {
	source: string;
	target: string;
}

/**
 * Splits a rendered edge id (`L_<source>_<target>_<n>`) into its endpoints.
 *
 * Node ids may contain underscores themselves, so every split point is tried
 * from left to right and the first one where both halves name known nodes wins.
 * The order is fixed: a different pick would change the emitted notation.
 */
export function resolveEdgeId(edgeId: string, knownIds: ReadonlySet<string>): ResolvedEdge | null {
	if (!edgeId.startsWith(EDGE_ID_PREFIX)) {
		return null;
	}
	const segments = edgeId.slice(EDGE_ID_PREFIX.length).split('_');

	for (let i = 1; i < segments.length; i += 1) {
		const source = resolveHalf(segments.slice(0, i).join('_'), knownIds);
		if (!source) {
			continue;
		}
		const target = resolveHalf(segments.slice(i).join('_'), knownIds);
		if (target) {
			return { source, target };
		}
	}
	return null;
}
