/**
 * @fileoverview Component exports for TUI
 */

export { ToolTable } from './ToolTable.js';
export { LogPane } from './LogPane.js';
export { StatusBar } from './StatusBar.js';
export { HelpOverlay } from './HelpOverlay.js';
