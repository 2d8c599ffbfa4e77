/**
 * Failure kinds raised by the core. All are synchronous and leave the
 * document and selection untouched.
 */

export type MindMapErrorCode =
    | 'NODE_NOT_FOUND'
    | 'ROOT_NODE'
    | 'CYCLE'
    | 'INVALID_RANGE'
    | 'INVALID_PARENT'
    | 'ARROW_NOT_FOUND'
    | 'SUMMARY_NOT_FOUND'
    | 'INVALID_CONFIG'
    | 'INVALID_SNAPSHOT'
    | 'CLIPBOARD_EMPTY';

export class MindMapError extends Error {
    readonly code: MindMapErrorCode;

    constructor(code: MindMapErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class NodeNotFoundError extends MindMapError {
    readonly nodeId: string;

    constructor(nodeId: string) {
        super('NODE_NOT_FOUND', `Node not found: ${nodeId}`);
        this.nodeId = nodeId;
    }
}

/** Operation is structurally forbidden on the root node. */
export class RootNodeError extends MindMapError {
    constructor(operation: string) {
        super('ROOT_NODE', `Cannot ${operation} the root node`);
    }
}

export class CycleError extends MindMapError {
    readonly nodeId: string;
    readonly targetId: string;

    constructor(nodeId: string, targetId: string) {
        super(
            'CYCLE',
            nodeId === targetId
                ? `Cannot move node ${nodeId} under itself`
                : `Cannot move node ${nodeId} under its descendant ${targetId}`,
        );
        this.nodeId = nodeId;
        this.targetId = targetId;
    }
}

export class InvalidRangeError extends MindMapError {
    constructor(startIndex: number, endIndex: number, childCount: number) {
        super(
            'INVALID_RANGE',
            `Invalid range [${startIndex}, ${endIndex}] for ${childCount} children`,
        );
    }
}

export class InvalidParentError extends MindMapError {
    constructor(message: string) {
        super('INVALID_PARENT', message);
    }
}

export class ArrowNotFoundError extends MindMapError {
    constructor(arrowId: string) {
        super('ARROW_NOT_FOUND', `Arrow not found: ${arrowId}`);
    }
}

export class SummaryNotFoundError extends MindMapError {
    constructor(summaryId: string) {
        super('SUMMARY_NOT_FOUND', `Summary not found: ${summaryId}`);
    }
}

export class ConfigError extends MindMapError {
    readonly field: string;

    constructor(field: string, message: string) {
        super('INVALID_CONFIG', `Invalid config "${field}": ${message}`);
        this.field = field;
    }
}

export class SnapshotFormatError extends MindMapError {
    readonly path: string;

    constructor(path: string, message: string) {
        super('INVALID_SNAPSHOT', `Invalid snapshot at ${path}: ${message}`);
        this.path = path;
    }
}

export class ClipboardEmptyError extends MindMapError {
    constructor() {
        super('CLIPBOARD_EMPTY', 'Nothing to paste');
    }
}
