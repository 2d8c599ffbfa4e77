import type { TextMetrics, ThemeMetrics } from '../src/engine/layout.ts';
import type { MindmapDocument, MindmapNode } from '../src/types/mindmap.ts';

/** Terse node builder for fixtures. */
export function node(
    id: string,
    children: MindmapNode[] = [],
    extra: Partial<Omit<MindmapNode, 'id' | 'children'>> = {},
): MindmapNode {
    return { id, topic: id.toUpperCase(), children, expanded: true, tags: [], icons: [], ...extra };
}

export function doc(root: MindmapNode, extra: Partial<Omit<MindmapDocument, 'root'>> = {}): MindmapDocument {
    return { root, arrows: [], summaries: [], direction: 'side', theme: 'light', ...extra };
}

/** Deterministic ids: `${prefix}1`, `${prefix}2`, ... */
export function sequentialIds(prefix = 'n'): () => string {
    let counter = 0;
    return () => `${prefix}${++counter}`;
}

/** Fixed-width text: 10px per character, 20px per line. */
export function fixedMeasure({ text }: { text: string }): TextMetrics {
    return { width: text.length * 10, height: 20, lastLineWidth: text.length * 10, lastLineHeight: 20 };
}

export const testMetrics: ThemeMetrics = {
    mainGapX: 50,
    mainGapY: 20,
    nodeGapX: 15,
    nodeGapY: 4,
    topicPadding: 5,
    measureText: fixedMeasure,
};
