import type * as vscode from 'vscode';
import { ScopeEchoServices } from './services';

/**
 * Handle when the set of visible editors changes - repaint annotations into every one of them
 */
export function handleVisibleEditorsChange(editors: readonly vscode.TextEditor[], services: ScopeEchoServices): void {
	for (const editor of editors) {
		if (services.controller.isEnabled(editor.document.uri.toString())) {
			services.surface.paint(editor);
		}
	}
}
