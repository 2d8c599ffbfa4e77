/**
 * Typed operation events, emitted once per completed user-visible
 * operation. Undo UIs, analytics and sync layers build on this stream.
 */
import { createLogger } from '../utils/logger';

const log = createLogger('events');

export type NodeAddKind = 'addChild' | 'addSibling' | 'insertParent' | 'paste';

export type MindMapEvent =
    | { type: 'nodeAdded'; kind: NodeAddKind; nodeId: string; parentId: string }
    | { type: 'nodeRemoved'; nodeId: string; parentId: string; removedIds: readonly string[] }
    | {
          type: 'nodeMoved';
          nodeId: string;
          oldParentId: string;
          newParentId: string;
          isReorder: boolean;
          index: number;
      }
    | { type: 'nodeUpdated'; nodeId: string; field: NodeField }
    | { type: 'expandChanged'; nodeId: string; expanded: boolean }
    | { type: 'selectionChanged'; nodeIds: readonly string[] }
    | { type: 'focusChanged'; nodeId: string | null }
    | { type: 'beginEdit'; nodeId: string }
    | { type: 'finishEdit'; nodeId: string; topic: string }
    | { type: 'hyperlinkActivated'; nodeId: string; url: string }
    | { type: 'arrowCreated'; arrowId: string; fromNodeId: string; toNodeId: string }
    | { type: 'arrowRemoved'; arrowId: string }
    | { type: 'arrowUpdated'; arrowId: string }
    | { type: 'summaryCreated'; summaryId: string; parentNodeId: string }
    | { type: 'summaryRemoved'; summaryId: string }
    | { type: 'summaryUpdated'; summaryId: string }
    | { type: 'directionChanged'; direction: string }
    | { type: 'historyChanged'; action: 'undo' | 'redo' }
    | { type: 'documentReplaced' };

export type NodeField = 'topic' | 'style' | 'hyperlink' | 'note' | 'tags' | 'icons' | 'branchColor' | 'direction';

export type MindMapEventType = MindMapEvent['type'];

export type EventListener = (event: MindMapEvent) => void;

export interface EventChannel {
    /** Returns an unsubscribe function. */
    subscribe: (listener: EventListener) => () => void;
    /** Listen to one event type only. */
    on: <K extends MindMapEventType>(
        type: K,
        listener: (event: Extract<MindMapEvent, { type: K }>) => void,
    ) => () => void;
    emit: (event: MindMapEvent) => void;
}

export function createEventChannel(): EventChannel {
    const listeners = new Set<EventListener>();

    const subscribe = (listener: EventListener): (() => void) => {
        listeners.add(listener);
        return () => {
            listeners.delete(listener);
        };
    };

    return {
        subscribe,

        on(type, listener) {
            return subscribe((event) => {
                if (isEventOf(event, type)) listener(event);
            });
        },

        emit(event) {
            for (const listener of [...listeners]) {
                try {
                    listener(event);
                } catch (error) {
                    log.error(`listener failed on "${event.type}"`, error);
                }
            }
        },
    };
}

function isEventOf<K extends MindMapEventType>(
    event: MindMapEvent,
    type: K,
): event is Extract<MindMapEvent, { type: K }> {
    return event.type === type;
}
