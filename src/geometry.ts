export interface Point {
	x: number;
	y: number;
}

export interface BoundingBox {
	left: number;
	top: number;
	right: number;
	bottom: number;
}

/**
 * Horizontal weight of {@link weightedDistance}. Messages are laid out top to
 * bottom, so vertical offset dominates when pairing a message with its label.
 */
export const HORIZONTAL_WEIGHT = 0.3;

// ---------------------------------------------------------------------------
// Attribute parsing
// ---------------------------------------------------------------------------

/**
 * Parses a numeric SVG attribute.
 * @param fallback - Value used when the attribute is absent.
 * @returns The number, or null when the attribute is present but not numeric.
 */
export function parseNumber(value: string | null | undefined, fallback = 0): number | null {
	if (value === null || value === undefined || value.trim() === '') {
		return fallback;
	}
	const parsed = Number(value.trim().replace(/px$/, ''));
	return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reads the first `translate(x, y)` offset of a transform attribute. A missing
 * y component is 0, as in SVG.
 */
export function parseTranslate(transform: string | null | undefined): Point | null {
	if (!transform) {
		return null;
	}
	const match = transform.match(/translate\(\s*([^,\s)]+)(?:[\s,]+([^,\s)]+))?\s*\)/);
	if (!match) {
		return null;
	}
	const x = parseNumber(match[1]);
	const y = parseNumber(match[2]);
	if (x === null || y === null) {
		return null;
	}
	return { x, y };
}

/** Parameters per segment, and where the segment's end point sits among them. */
const PATH_SEGMENTS: Readonly<Record<string, { size: number; end: number }>> = {
	M: { size: 2, end: 0 },
	L: { size: 2, end: 0 },
	T: { size: 2, end: 0 },
	S: { size: 4, end: 2 },
	Q: { size: 4, end: 2 },
	C: { size: 6, end: 4 },
	A: { size: 7, end: 5 },
};

/**
 * Lists the vertices of a path description: the end point of every segment,
 * with relative commands resolved against the current point. Control points
 * are skipped.
 */
export function parsePathPoints(d: string | null | undefined): Point[] {
	if (!d) {
		return [];
	}
	const points: Point[] = [];
	let current: Point = { x: 0, y: 0 };

	for (const [, command = '', params = ''] of d.matchAll(/([MLTSQCAHVZ])([^MLTSQCAHVZ]*)/gi)) {
		const upper = command.toUpperCase();
		const relative = command !== upper;
		const numbers = (params.match(/-?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?/gi) ?? []).map(Number);

		if (upper === 'H' || upper === 'V') {
			for (const value of numbers) {
				current =
					upper === 'H'
						? { x: relative ? current.x + value : value, y: current.y }
						: { x: current.x, y: relative ? current.y + value : value };
				points.push(current);
			}
			continue;
		}

		const segment = PATH_SEGMENTS[upper];
		if (!segment) {
			continue;
		}
		for (let i = 0; i + segment.size <= numbers.length; i += segment.size) {
			const x = numbers[i + segment.end];
			const y = numbers[i + segment.end + 1];
			if (x === undefined || y === undefined || !Number.isFinite(x) || !Number.isFinite(y)) {
				continue;
			}
			current = relative ? { x: current.x + x, y: current.y + y } : { x, y };
			points.push(current);
		}
	}
	return points;
}

/**
 * Derives a shape's box from explicit `x/y/width/height` attributes, or from a
 * `translate` transform when there is one and no explicit position. Shapes
 * without a size collapse to a point box.
 * @returns null when any present attribute is not numeric.
 */
export function boundingBoxOf(attrs: Readonly<Record<string, string>>): BoundingBox | null {
	const width = parseNumber(attrs.width);
	const height = parseNumber(attrs.height);
	if (width === null || height === null) {
		return null;
	}

	let origin: Point | null;
	if (attrs.x === undefined && attrs.y === undefined && attrs.transform !== undefined) {
		origin = parseTranslate(attrs.transform);
	} else {
		const x = parseNumber(attrs.x);
		const y = parseNumber(attrs.y);
		origin = x === null || y === null ? null : { x, y };
	}
	if (!origin) {
		return null;
	}

	const left = Math.min(origin.x, origin.x + width);
	const top = Math.min(origin.y, origin.y + height);
	return {
		left,
		top,
		right: left + Math.abs(width),
		bottom: top + Math.abs(height),
	};
}

export function pointBox(point: Point): BoundingBox {
	return { left: point.x, top: point.y, right: point.x, bottom: point.y };
}

// ---------------------------------------------------------------------------
// Box relations
// ---------------------------------------------------------------------------

/**
 * Inclusive containment: equal boxes contain each other.
 */
export function contains(outer: BoundingBox, inner: BoundingBox): boolean {
	return (
		outer.left <= inner.left &&
		outer.top <= inner.top &&
		outer.right >= inner.right &&
		outer.bottom >= inner.bottom
	);
}

export function sameBox(a: BoundingBox, b: BoundingBox): boolean {
	return a.left === b.left && a.top === b.top && a.right === b.right && a.bottom === b.bottom;
}

export function properlyContains(outer: BoundingBox, inner: BoundingBox): boolean {
	return contains(outer, inner) && !sameBox(outer, inner);
}

export function area(box: BoundingBox): number {
	return (box.right - box.left) * (box.bottom - box.top);
}

/**
 * The point halfway along a polyline's vertex list; for two-point lines the
 * midpoint of the segment.
 */
export function midpoint(points: readonly Point[]): Point | null {
	if (points.length === 0) {
		return null;
	}
	if (points.length % 2 === 1) {
		return points[(points.length - 1) / 2] ?? null;
	}
	const a = points[points.length / 2 - 1];
	const b = points[points.length / 2];
	if (!a || !b) {
		return null;
	}
	return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

// ---------------------------------------------------------------------------
// Nearest matching
// ---------------------------------------------------------------------------

export function euclidean(a: Point, b: Point): number {
	return Math.hypot(a.x - b.x, a.y - b.y);
}

export function weightedDistance(a: Point, b: Point): number {
	return Math.abs(a.y - b.y) + HORIZONTAL_WEIGHT * Math.abs(a.x - b.x);
}

/**
 * Linear scan for the candidate closest to a point. The first of several equally
 * close candidates wins.
 * @param distance - Distance between the point and a candidate.
 */
export function nearest<T>(
	point: Point,
	candidates: Iterable<T>,
	distance: (point: Point, candidate: T) => number
): T | null {
	let best: T | null = null;
	let bestDistance = Number.POSITIVE_INFINITY;
	for (const candidate of candidates) {
		const d = distance(point, candidate);
		if (d < bestDistance) {
			best = candidate;
			bestDistance = d;
		}
	}
	return best;
}
