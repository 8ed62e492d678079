import type { BoundingBox, Point } from '../geometry';
import {
	area,
	boundingBoxOf,
	contains,
	euclidean,
	midpoint,
	nearest,
	parsePathPoints,
	parseTranslate,
	pointBox,
	properlyContains,
} from '../geometry';
import { canonicalNodeId, resolveEdgeId } from '../identifiers';
import type { ElementNode } from '../nodes';
import { byTag, collapsedText, findAll, findFirst, getAttr, hasClass } from '../nodes';
import type { ReconstructionContext } from './context';
import { createContext, generateId, quoteSafe, shapeLabel } from './context';

export interface FlowchartNode {
	id: string;
	text: string;
	/** Point box at the node's centre; null when its transform is unreadable. */
	box: BoundingBox | null;
}

export interface FlowchartCluster {
	id: string;
	title: string;
	box: BoundingBox;
	nodeIds: string[];
	childIds: string[];
	parentId: string | null;
}

export interface FlowchartEdge {
	source: string;
	target: string;
	label?: string;
}

export interface FlowchartModel {
	nodes: Map<string, FlowchartNode>;
	clusters: FlowchartCluster[];
	edges: FlowchartEdge[];
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Collects node shapes keyed by canonical id. Repeated ids keep the first shape.
 */
export function extractNodes(svg: ElementNode): Map<string, FlowchartNode> {
	const nodes = new Map<string, FlowchartNode>();

	for (const shape of findAll(svg, (el) => el.tag === 'g' && hasClass(el, 'node'))) {
		const id = canonicalNodeId(getAttr(shape, 'id') || '');
		if (!id || nodes.has(id)) {
			continue;
		}
		const origin = parseTranslate(getAttr(shape, 'transform'));
		nodes.set(id, {
			id,
			text: shapeLabel(shape),
			box: origin ? pointBox(origin) : null,
		});
	}

	return nodes;
}

/**
 * Collects cluster boxes in document order. Clusters whose rectangle cannot be
 * measured are left out.
 */
export function extractClusters(svg: ElementNode, context: ReconstructionContext): FlowchartCluster[] {
	const clusters: FlowchartCluster[] = [];

	for (const shape of findAll(svg, (el) => el.tag === 'g' && hasClass(el, 'cluster'))) {
		const id = getAttr(shape, 'id') || generateId(context, 'cluster');
		const rect = findFirst(shape, byTag('rect'));
		const box = rect ? boundingBoxOf(rect.attrs) : null;
		if (!box) {
			continue;
		}
		const hasLabel = findFirst(shape, (el) => hasClass(el, 'cluster-label')) !== null;
		const title = hasLabel ? shapeLabel(shape, 'cluster-label') : '';
		clusters.push({
			id,
			title: title || id,
			box,
			nodeIds: [],
			childIds: [],
			parentId: null,
		});
	}

	return clusters;
}

/**
 * Records each cluster under its direct parent: the smallest cluster that
 * properly contains it with no other cluster in between.
 */
export function linkClusters(clusters: FlowchartCluster[]): void {
	for (const child of clusters) {
		const enclosing = clusters.filter(
			(candidate) => candidate !== child && properlyContains(candidate.box, child.box)
		);
		const direct = enclosing.filter(
			(parent) =>
				!enclosing.some(
					(between) => between !== parent && properlyContains(parent.box, between.box)
				)
		);

		let parent: FlowchartCluster | null = null;
		for (const candidate of direct) {
			if (!parent || area(candidate.box) < area(parent.box)) {
				parent = candidate;
			}
		}
		if (parent) {
			child.parentId = parent.id;
			parent.childIds.push(child.id);
		}
	}
}

/**
 * Places every measurable node in the smallest cluster containing it. Clusters
 * are visited from the smallest area up, so a node claimed by an inner cluster
 * is never claimed again by an outer one.
 */
export function assignNodes(clusters: FlowchartCluster[], nodes: Map<string, FlowchartNode>): void {
	const claimed = new Set<string>();
	const byArea = [...clusters].sort((a, b) => area(a.box) - area(b.box));

	for (const cluster of byArea) {
		for (const node of nodes.values()) {
			if (!node.box || claimed.has(node.id) || !contains(cluster.box, node.box)) {
				continue;
			}
			cluster.nodeIds.push(node.id);
			claimed.add(node.id);
		}
	}
}

interface EdgeShape {
	rawId: string;
	edge: FlowchartEdge;
	middle: Point | null;
}

/**
 * Resolves link paths into edges between known nodes, then attaches edge
 * labels by `data-id` or, failing that, to the nearest unlabelled edge.
 */
export function extractEdges(svg: ElementNode, nodes: Map<string, FlowchartNode>): FlowchartEdge[] {
	const knownIds = new Set(nodes.keys());
	const shapes: EdgeShape[] = [];

	for (const path of findAll(svg, (el) => el.tag === 'path' && hasClass(el, 'flowchart-link'))) {
		const rawId = getAttr(path, 'id') || '';
		const resolved = resolveEdgeId(rawId, knownIds);
		if (!resolved) {
			continue;
		}
		shapes.push({
			rawId,
			edge: { source: resolved.source, target: resolved.target },
			middle: midpoint(parsePathPoints(getAttr(path, 'd'))),
		});
	}

	const floating: Array<{ text: string; at: Point }> = [];
	for (const label of findAll(svg, (el) => el.tag === 'g' && hasClass(el, 'edgeLabel'))) {
		const text = quoteSafe(collapsedText(label));
		if (!text) {
			continue;
		}
		const tagged = findFirst(label, (el) => getAttr(el, 'data-id') !== null);
		const dataId = getAttr(label, 'data-id') ?? (tagged ? getAttr(tagged, 'data-id') : null);
		const owner = dataId ? shapes.find((shape) => shape.rawId === dataId) : undefined;
		if (owner) {
			owner.edge.label ??= text;
			continue;
		}
		const at = parseTranslate(getAttr(label, 'transform'));
		if (at) {
			floating.push({ text, at });
		}
	}

	for (const { text, at } of floating) {
		const open = shapes.filter(
			(shape): shape is EdgeShape & { middle: Point } => !shape.edge.label && shape.middle !== null
		);
		const closest = nearest(at, open, (point, shape) => euclidean(point, shape.middle));
		if (closest) {
			closest.edge.label = text;
		}
	}

	return shapes.map((shape) => shape.edge);
}

export function buildFlowchartModel(
	svg: ElementNode,
	context: ReconstructionContext = createContext()
): FlowchartModel {
	const nodes = extractNodes(svg);
	const clusters = extractClusters(svg, context);
	linkClusters(clusters);
	assignNodes(clusters, nodes);
	const edges = extractEdges(svg, nodes);
	return { nodes, clusters, edges };
}

// ---------------------------------------------------------------------------
// Emission
// ---------------------------------------------------------------------------

const INDENT = '    ';

function edgeLine(edge: FlowchartEdge): string {
	return edge.label
		? `${edge.source} -->|"${edge.label}"| ${edge.target}`
		: `${edge.source} --> ${edge.target}`;
}

/**
 * Writes a model as flowchart notation: nested subgraphs first, then nodes
 * outside any cluster, then the sorted, de-duplicated edge list.
 */
export function renderFlowchart(model: FlowchartModel): string {
	const lines = ['flowchart TD'];
	const clustersById = new Map(model.clusters.map((cluster) => [cluster.id, cluster]));

	const nodeLine = (id: string, depth: number) => {
		const node = model.nodes.get(id);
		if (node) {
			lines.push(`${INDENT.repeat(depth)}${node.id}["${node.text}"]`);
		}
	};

	const openCluster = (cluster: FlowchartCluster, depth: number) => {
		const prefix = INDENT.repeat(depth);
		lines.push(`${prefix}subgraph ${cluster.id}["${cluster.title}"]`);
		cluster.nodeIds.forEach((id) => nodeLine(id, depth + 1));
		cluster.childIds.forEach((childId) => {
			const child = clustersById.get(childId);
			if (child) {
				openCluster(child, depth + 1);
			}
		});
		lines.push(`${prefix}end`);
	};

	model.clusters
		.filter((cluster) => cluster.parentId === null)
		.forEach((cluster) => openCluster(cluster, 1));

	const clustered = new Set(model.clusters.flatMap((cluster) => cluster.nodeIds));
	for (const id of model.nodes.keys()) {
		if (!clustered.has(id)) {
			nodeLine(id, 1);
		}
	}

	const edgeLines = [...new Set(model.edges.map(edgeLine))].sort();
	if (edgeLines.length > 0) {
		lines.push('');
		edgeLines.forEach((line) => lines.push(`${INDENT}${line}`));
	}

	return lines.join('\n');
}

/**
 * Rebuilds flowchart notation from a rendered flowchart SVG.
 * @returns The notation, or null when no node could be recovered.
 */
export function reconstructFlowchart(svg: ElementNode): string | null {
	const model = buildFlowchartModel(svg, createContext());
	if (model.nodes.size === 0) {
		return null;
	}
	return renderFlowchart(model);
}
