/**
 * Snapshot export/import.
 *
 * The exported shape mirrors the in-memory document one to one, so a
 * round trip is lossless for every field the core owns. Import treats its
 * input as untrusted and narrows it field by field.
 */
import type {
    ArrowStyle,
    BranchSide,
    LayoutDirection,
    MindmapArrow,
    MindmapDocument,
    MindmapNode,
    MindmapSummary,
    NodeStyle,
    NodeTag,
    SummaryStyle,
    Vector,
} from '../types/mindmap';
import { SnapshotFormatError } from './errors';

export const SNAPSHOT_VERSION = 1;

export interface SerializedSnapshot {
    version: number;
    document: MindmapDocument;
}

/* ------------------------------------------------------------------ */
/*  Export                                                            */
/* ------------------------------------------------------------------ */

export function serializeDocument(document: MindmapDocument): SerializedSnapshot {
    return { version: SNAPSHOT_VERSION, document };
}

export function exportToJson(document: MindmapDocument, space = 2): string {
    return JSON.stringify(serializeDocument(document), null, space);
}

/* ------------------------------------------------------------------ */
/*  Type guards                                                       */
/* ------------------------------------------------------------------ */

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(path: string, message: string): never {
    throw new SnapshotFormatError(path, message);
}

function expectRecord(value: unknown, path: string): UnknownRecord {
    if (!isRecord(value)) fail(path, 'expected an object');
    return value;
}

function expectArray(value: unknown, path: string): readonly unknown[] {
    if (!Array.isArray(value)) fail(path, 'expected an array');
    return value;
}

function expectString(value: unknown, path: string): string {
    if (typeof value !== 'string') fail(path, 'expected a string');
    return value;
}

function expectId(value: unknown, path: string): string {
    const id = expectString(value, path);
    if (id.length === 0) fail(path, 'expected a non-empty id');
    return id;
}

function expectBoolean(value: unknown, path: string): boolean {
    if (typeof value !== 'boolean') fail(path, 'expected a boolean');
    return value;
}

function expectNumber(value: unknown, path: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) fail(path, 'expected a finite number');
    return value;
}

function expectIndex(value: unknown, path: string): number {
    const index = expectNumber(value, path);
    if (!Number.isInteger(index) || index < 0) fail(path, 'expected a non-negative integer');
    return index;
}

function optionalString(value: unknown, path: string): string | undefined {
    return value === undefined ? undefined : expectString(value, path);
}

function optionalNumber(value: unknown, path: string): number | undefined {
    return value === undefined ? undefined : expectNumber(value, path);
}

function optionalBoolean(value: unknown, path: string): boolean | undefined {
    return value === undefined ? undefined : expectBoolean(value, path);
}

function parseVector(value: unknown, path: string): Vector {
    const record = expectRecord(value, path);
    return { x: expectNumber(record.x, `${path}.x`), y: expectNumber(record.y, `${path}.y`) };
}

function parseDirection(value: unknown, path: string): LayoutDirection {
    if (value === 'side' || value === 'left' || value === 'right') return value;
    fail(path, 'expected "side", "left" or "right"');
}

function parseBranchSide(value: unknown, path: string): BranchSide | undefined {
    if (value === undefined || value === 'left' || value === 'right') return value;
    fail(path, 'expected "left" or "right"');
}

function parseFontWeight(value: unknown, path: string): 'normal' | 'bold' | undefined {
    if (value === undefined || value === 'normal' || value === 'bold') return value;
    fail(path, 'expected "normal" or "bold"');
}

function parseNodeStyle(value: unknown, path: string): NodeStyle | undefined {
    if (value === undefined) return undefined;
    const record = expectRecord(value, path);
    const width = optionalNumber(record.width, `${path}.width`);
    const fontSize = optionalNumber(record.fontSize, `${path}.fontSize`);
    const fontWeight = parseFontWeight(record.fontWeight, `${path}.fontWeight`);
    const color = optionalString(record.color, `${path}.color`);
    const background = optionalString(record.background, `${path}.background`);
    return {
        ...(width !== undefined ? { width } : {}),
        ...(fontSize !== undefined ? { fontSize } : {}),
        ...(fontWeight !== undefined ? { fontWeight } : {}),
        ...(color !== undefined ? { color } : {}),
        ...(background !== undefined ? { background } : {}),
    };
}

function parseTag(value: unknown, path: string): NodeTag {
    const record = expectRecord(value, path);
    const color = optionalString(record.color, `${path}.color`);
    return {
        text: expectString(record.text, `${path}.text`),
        ...(color !== undefined ? { color } : {}),
    };
}

function parseArrowStyle(value: unknown, path: string): ArrowStyle | undefined {
    if (value === undefined) return undefined;
    const record = expectRecord(value, path);
    const color = optionalString(record.color, `${path}.color`);
    const width = optionalNumber(record.width, `${path}.width`);
    const dashed = optionalBoolean(record.dashed, `${path}.dashed`);
    return {
        ...(color !== undefined ? { color } : {}),
        ...(width !== undefined ? { width } : {}),
        ...(dashed !== undefined ? { dashed } : {}),
    };
}

function parseSummaryStyle(value: unknown, path: string): SummaryStyle | undefined {
    if (value === undefined) return undefined;
    const record = expectRecord(value, path);
    const color = optionalString(record.color, `${path}.color`);
    return color !== undefined ? { color } : {};
}

/* ------------------------------------------------------------------ */
/*  Tree                                                              */
/* ------------------------------------------------------------------ */

interface PendingNode {
    record: UnknownRecord;
    path: string;
    children: MindmapNode[];
    parent: PendingNode | null;
}

function buildNode(pending: PendingNode): MindmapNode {
    const { record, path } = pending;
    const direction = parseBranchSide(record.direction, `${path}.direction`);
    const style = parseNodeStyle(record.style, `${path}.style`);
    const hyperlink = optionalString(record.hyperlink, `${path}.hyperlink`);
    const branchColor = optionalString(record.branchColor, `${path}.branchColor`);
    const note = optionalString(record.note, `${path}.note`);
    return {
        id: expectId(record.id, `${path}.id`),
        topic: expectString(record.topic, `${path}.topic`),
        children: pending.children,
        expanded: expectBoolean(record.expanded ?? true, `${path}.expanded`),
        tags: expectArray(record.tags ?? [], `${path}.tags`).map((tag, i) =>
            parseTag(tag, `${path}.tags[${i}]`),
        ),
        icons: expectArray(record.icons ?? [], `${path}.icons`).map((icon, i) =>
            expectString(icon, `${path}.icons[${i}]`),
        ),
        ...(direction !== undefined ? { direction } : {}),
        ...(style !== undefined ? { style } : {}),
        ...(hyperlink !== undefined ? { hyperlink } : {}),
        ...(branchColor !== undefined ? { branchColor } : {}),
        ...(note !== undefined ? { note } : {}),
    };
}

/**
 * Rebuild the tree bottom-up without recursion: children are completed
 * in reverse pre-order, so every node's children exist before it does.
 */
function parseTree(value: unknown, path: string, ids: Set<string>): MindmapNode {
    const rootPending: PendingNode = {
        record: expectRecord(value, path),
        path,
        children: [],
        parent: null,
    };
    const order: PendingNode[] = [];
    const stack: PendingNode[] = [rootPending];

    while (stack.length > 0) {
        const pending = stack.pop();
        if (!pending) break;
        const id = expectId(pending.record.id, `${pending.path}.id`);
        if (ids.has(id)) fail(`${pending.path}.id`, `duplicate node id "${id}"`);
        ids.add(id);
        order.push(pending);

        const children = expectArray(pending.record.children ?? [], `${pending.path}.children`);
        for (let i = children.length - 1; i >= 0; i--) {
            const childPath = `${pending.path}.children[${i}]`;
            stack.push({ record: expectRecord(children[i], childPath), path: childPath, children: [], parent: pending });
        }
    }

    let root: MindmapNode | null = null;
    for (let i = order.length - 1; i >= 0; i--) {
        const pending = order[i];
        // Siblings were finished last-to-first.
        pending.children.reverse();
        const node = buildNode(pending);
        if (pending.parent) {
            pending.parent.children.push(node);
        } else {
            root = node;
        }
    }

    if (!root) fail(path, 'missing root node');
    return root;
}

/* ------------------------------------------------------------------ */
/*  Annotations                                                       */
/* ------------------------------------------------------------------ */

const ZERO: Vector = { x: 0, y: 0 };

function parseArrow(value: unknown, path: string, nodeIds: ReadonlySet<string>): MindmapArrow {
    const record = expectRecord(value, path);
    const fromNodeId = expectId(record.fromNodeId, `${path}.fromNodeId`);
    const toNodeId = expectId(record.toNodeId, `${path}.toNodeId`);
    if (!nodeIds.has(fromNodeId)) fail(`${path}.fromNodeId`, `unknown node "${fromNodeId}"`);
    if (!nodeIds.has(toNodeId)) fail(`${path}.toNodeId`, `unknown node "${toNodeId}"`);

    const label = optionalString(record.label, `${path}.label`);
    const style = parseArrowStyle(record.style, `${path}.style`);
    return {
        id: expectId(record.id, `${path}.id`),
        fromNodeId,
        toNodeId,
        bidirectional: expectBoolean(record.bidirectional ?? false, `${path}.bidirectional`),
        controlPointOffset1: parseVector(record.controlPointOffset1 ?? ZERO, `${path}.controlPointOffset1`),
        controlPointOffset2: parseVector(record.controlPointOffset2 ?? ZERO, `${path}.controlPointOffset2`),
        ...(label !== undefined ? { label } : {}),
        ...(style !== undefined ? { style } : {}),
    };
}

function parseSummary(
    value: unknown,
    path: string,
    childCounts: ReadonlyMap<string, number>,
): MindmapSummary {
    const record = expectRecord(value, path);
    const parentNodeId = expectId(record.parentNodeId, `${path}.parentNodeId`);
    const childCount = childCounts.get(parentNodeId);
    if (childCount === undefined) fail(`${path}.parentNodeId`, `unknown node "${parentNodeId}"`);

    const startIndex = expectIndex(record.startIndex, `${path}.startIndex`);
    const endIndex = expectIndex(record.endIndex, `${path}.endIndex`);
    if (startIndex > endIndex || endIndex >= childCount) {
        fail(path, `range [${startIndex}, ${endIndex}] does not fit ${childCount} children`);
    }

    const style = parseSummaryStyle(record.style, `${path}.style`);
    return {
        id: expectId(record.id, `${path}.id`),
        parentNodeId,
        startIndex,
        endIndex,
        label: expectString(record.label ?? '', `${path}.label`),
        ...(style !== undefined ? { style } : {}),
    };
}

function collectChildCounts(root: MindmapNode): Map<string, number> {
    const counts = new Map<string, number>();
    const stack: MindmapNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) break;
        counts.set(node.id, node.children.length);
        stack.push(...node.children);
    }
    return counts;
}

function ensureUnique(ids: readonly string[], path: string): void {
    const seen = new Set<string>();
    for (const id of ids) {
        if (seen.has(id)) fail(path, `duplicate id "${id}"`);
        seen.add(id);
    }
}

/* ------------------------------------------------------------------ */
/*  Import                                                            */
/* ------------------------------------------------------------------ */

/**
 * Validate an untrusted value and return the document it describes.
 * Accepts either a `{ version, document }` envelope or a bare document.
 */
export function parseDocument(value: unknown): MindmapDocument {
    const top = expectRecord(value, '$');
    let body = top;
    let path = '$';
    if ('version' in top) {
        const version = expectNumber(top.version, '$.version');
        if (version !== SNAPSHOT_VERSION) fail('$.version', `unsupported version ${version}`);
        body = expectRecord(top.document, '$.document');
        path = '$.document';
    }

    const nodeIds = new Set<string>();
    const root = parseTree(body.root, `${path}.root`, nodeIds);
    const childCounts = collectChildCounts(root);

    const arrows = expectArray(body.arrows ?? [], `${path}.arrows`).map((arrow, i) =>
        parseArrow(arrow, `${path}.arrows[${i}]`, nodeIds),
    );
    ensureUnique(arrows.map((arrow) => arrow.id), `${path}.arrows`);

    const summaries = expectArray(body.summaries ?? [], `${path}.summaries`).map((summary, i) =>
        parseSummary(summary, `${path}.summaries[${i}]`, childCounts),
    );
    ensureUnique(summaries.map((summary) => summary.id), `${path}.summaries`);

    return {
        root,
        arrows,
        summaries,
        direction: parseDirection(body.direction ?? 'side', `${path}.direction`),
        theme: expectString(body.theme ?? 'light', `${path}.theme`),
    };
}

/**
 * Check an in-memory document against the same rules as an import:
 * unique ids, arrows between existing nodes, summary ranges that fit.
 */
export function assertValidDocument(document: MindmapDocument): void {
    parseDocument(serializeDocument(document));
}

export function importFromJson(json: string): MindmapDocument {
    let value: unknown;
    try {
        value = JSON.parse(json);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SnapshotFormatError('$', `malformed JSON: ${reason}`);
    }
    return parseDocument(value);
}
