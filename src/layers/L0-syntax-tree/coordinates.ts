import { hashContent } from '../../shared/hash';
import { createLogger } from '../../shared/logger';
import {
  ERROR_CODES,
  MutaformError,
  type Coordinate,
  type CoordinateSegment,
  type DigestSegment,
} from '../../shared/types';
import {
  canonicalText,
  childNodes,
  isMap,
  withChild,
  withQuotedChild,
  type SyntaxNode,
} from './nodes';

const log = createLogger({ layer: 'L0', module: 'coordinates' });

/** Physical path: child ordinals from the root, ignoring digest addressing. */
export type PhysicalPath = readonly number[];

export function nodeDigest(node: SyntaxNode): string {
  return hashContent(canonicalText(node));
}

/**
 * Segment that addresses the child at `index` of `parent`.
 * Maps are addressed by the digest of the entry key, sets by element digest;
 * everything else by ordinal.
 */
export function segmentFor(parent: SyntaxNode, index: number): CoordinateSegment {
  if (parent.kind !== 'associative') return index;
  if (isMap(parent)) {
    if (index % 2 === 0) {
      return { digest: nodeDigest(parent.items[index].node), slot: 'key' };
    }
    return { digest: nodeDigest(parent.items[index - 1].node), slot: 'val' };
  }
  return { digest: nodeDigest(parent.items[index].node), slot: 'elem' };
}

/** Resolve one segment against `node` to a physical child index, or -1. */
export function resolveSegment(node: SyntaxNode, segment: CoordinateSegment): number {
  if (typeof segment === 'number') {
    if (node.kind === 'associative' || node.kind === 'token') return -1;
    const count = childNodes(node).length;
    return Number.isInteger(segment) && segment >= 0 && segment < count ? segment : -1;
  }
  if (node.kind !== 'associative') return -1;

  const matches: number[] = [];
  if (isMap(node)) {
    if (segment.slot === 'elem') return -1;
    for (let i = 0; i < node.items.length; i += 2) {
      if (nodeDigest(node.items[i].node) === segment.digest) {
        const index = segment.slot === 'key' ? i : i + 1;
        if (index < node.items.length) matches.push(index);
      }
    }
  } else {
    if (segment.slot !== 'elem') return -1;
    node.items.forEach((item, i) => {
      if (nodeDigest(item.node) === segment.digest) matches.push(i);
    });
  }

  if (matches.length > 1) {
    const ambiguity = new MutaformError({
      code: ERROR_CODES.LOCATION_AMBIGUOUS,
      severity: 'low',
      message: `Digest ${segment.digest} matches ${matches.length} children; using the first`,
      context: { digest: segment.digest, slot: segment.slot, indices: matches },
    });
    log.warn({ code: ambiguity.code, ...ambiguity.context }, ambiguity.message);
  }
  return matches.length > 0 ? matches[0] : -1;
}

function notFound(coord: Coordinate, depth: number): MutaformError {
  return new MutaformError({
    code: ERROR_CODES.LOCATION_NOT_FOUND,
    severity: 'medium',
    message: `Coordinate "${formatCoordinate(coord)}" does not resolve at depth ${depth}`,
    context: { coordinate: formatCoordinate(coord), depth },
  });
}

/** Translate a coordinate to physical child ordinals. Throws LocationNotFound. */
export function resolvePath(root: SyntaxNode, coord: Coordinate): number[] {
  const path: number[] = [];
  let node = root;
  for (let depth = 0; depth < coord.length; depth++) {
    const index = resolveSegment(node, coord[depth]);
    if (index < 0) throw notFound(coord, depth);
    path.push(index);
    node = childNodes(node)[index];
  }
  return path;
}

export function nodeAtPath(root: SyntaxNode, path: PhysicalPath): SyntaxNode {
  let node = root;
  for (const index of path) {
    const children = childNodes(node);
    if (index < 0 || index >= children.length) {
      throw new MutaformError({
        code: ERROR_CODES.LOCATION_NOT_FOUND,
        severity: 'medium',
        message: `Physical path ${path.join('/')} does not resolve`,
        context: { path: [...path] },
      });
    }
    node = children[index];
  }
  return node;
}

/** Node at `coord`. Throws LocationNotFound when the path no longer resolves. */
export function decode(root: SyntaxNode, coord: Coordinate): SyntaxNode {
  return nodeAtPath(root, resolvePath(root, coord));
}

/** Coordinate of `target` (matched by identity) within `root`. Inverse of decode. */
export function encode(root: SyntaxNode, target: SyntaxNode): CoordinateSegment[] {
  const found = findCoordinate(root, target);
  if (!found) {
    throw new MutaformError({
      code: ERROR_CODES.LOCATION_NOT_FOUND,
      severity: 'medium',
      message: 'Node is not part of this tree snapshot',
    });
  }
  return found;
}

function findCoordinate(node: SyntaxNode, target: SyntaxNode): CoordinateSegment[] | null {
  if (node === target) return [];
  const children = childNodes(node);
  for (let i = 0; i < children.length; i++) {
    const rest = findCoordinate(children[i], target);
    if (rest) return [segmentFor(node, i), ...rest];
  }
  return null;
}

/** Replace the node at a physical path, copying only the spine above it. */
export function replaceAtPath(root: SyntaxNode, path: PhysicalPath, replacement: SyntaxNode): SyntaxNode {
  if (path.length === 0) return replacement;
  const [index, ...rest] = path;
  switch (root.kind) {
    case 'token':
      throw new MutaformError({
        code: ERROR_CODES.LOCATION_NOT_FOUND,
        severity: 'medium',
        message: 'Cannot descend into a token',
        context: { path: [...path] },
      });
    case 'quoted':
      return withQuotedChild(root, replaceAtPath(root.child, rest, replacement));
    case 'ordered':
    case 'associative': {
      const child = root.items[index];
      if (!child) {
        throw new MutaformError({
          code: ERROR_CODES.LOCATION_NOT_FOUND,
          severity: 'medium',
          message: `Child ${index} does not exist`,
          context: { path: [...path] },
        });
      }
      return withChild(root, index, replaceAtPath(child.node, rest, replacement));
    }
  }
}

/** Structural-sharing replacement of the node at `coord`. */
export function replace(root: SyntaxNode, coord: Coordinate, replacement: SyntaxNode): SyntaxNode {
  return replaceAtPath(root, resolvePath(root, coord), replacement);
}

// === Textual form ===

export function formatSegment(segment: CoordinateSegment): string {
  if (typeof segment === 'number') return String(segment);
  switch (segment.slot) {
    case 'key':
      return `#${segment.digest}.k`;
    case 'val':
      return `#${segment.digest}.v`;
    case 'elem':
      return `#${segment.digest}`;
  }
}

export function formatCoordinate(coord: Coordinate): string {
  return coord.map(formatSegment).join('/');
}

const DIGEST_SEGMENT_RE = /^#([0-9a-f]+)(?:\.([kv]))?$/;

export function parseCoordinate(text: string): CoordinateSegment[] {
  if (text === '') return [];
  return text.split('/').map((part) => {
    if (/^\d+$/.test(part)) return Number(part);
    const match = DIGEST_SEGMENT_RE.exec(part);
    if (!match) {
      throw new MutaformError({
        code: ERROR_CODES.LOCATION_NOT_FOUND,
        severity: 'medium',
        message: `Malformed coordinate segment "${part}" in "${text}"`,
        context: { coordinate: text },
      });
    }
    const segment: DigestSegment = {
      digest: match[1],
      slot: match[2] === 'k' ? 'key' : match[2] === 'v' ? 'val' : 'elem',
    };
    return segment;
  });
}

/** Location key shared by the coverage index and persisted records. */
export function locationKey(formId: string, coord: Coordinate | string): string {
  return `${formId}|${typeof coord === 'string' ? coord : formatCoordinate(coord)}`;
}
