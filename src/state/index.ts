/**
 * State Management
 */

export {
  createEditorState,
  RESERVED_ROWS,
  type EditorMode,
  type EditorState,
  type StatusMessage,
} from './editor-state.ts';
