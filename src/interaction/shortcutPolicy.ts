export type MindmapShortcutAction =
    | 'addChild'
    | 'addSibling'
    | 'deleteSelection'
    | 'toggleCollapse'
    | 'deselect'
    | 'exitFocus'
    | 'startEdit'
    | 'centerView'
    | 'undo'
    | 'redo'
    | 'copy'
    | 'paste'
    | 'zoomIn'
    | 'zoomOut'
    | null;

export interface ShortcutPolicyInput {
    key: string;
    /** A node, arrow or summary is selected. */
    hasSelection: boolean;
    isEditing: boolean;
    /** Ctrl on most platforms, Cmd on macOS. */
    hasModifier: boolean;
    hasShift: boolean;
    isEditableTarget: boolean;
    isFocused: boolean;
}

function getModifierAction(key: string, hasShift: boolean): MindmapShortcutAction {
    switch (key.toLowerCase()) {
        case 'z':
            return hasShift ? 'redo' : 'undo';
        case 'y':
            return 'redo';
        case 'c':
            return 'copy';
        case 'v':
            return 'paste';
        case '=':
        case '+':
            return 'zoomIn';
        case '-':
            return 'zoomOut';
        default:
            return null;
    }
}

export function getMindmapShortcutAction(input: ShortcutPolicyInput): MindmapShortcutAction {
    const { key, hasSelection, isEditing, hasModifier, hasShift, isEditableTarget, isFocused } = input;
    if (isEditing || isEditableTarget) return null;

    if (hasModifier) return getModifierAction(key, hasShift);

    switch (key) {
        case 'Escape':
            if (isFocused) return 'exitFocus';
            return hasSelection ? 'deselect' : null;
        case 'F1':
            return 'centerView';
    }

    if (!hasSelection) return null;

    switch (key) {
        case 'Tab':
            return 'addChild';
        case 'Enter':
            return 'addSibling';
        case 'Delete':
        case 'Backspace':
            return 'deleteSelection';
        case ' ':
            return 'toggleCollapse';
        case 'F2':
            return 'startEdit';
        default:
            return null;
    }
}
