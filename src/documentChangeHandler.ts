import type * as vscode from 'vscode';
import { ScopeEchoServices } from './services';

/**
 * Handle document changes: update the document's tree incrementally,
 * which recomputes its annotations when scope echo is enabled for it
 */
export function handleDocumentChange(event: vscode.TextDocumentChangeEvent, services: ScopeEchoServices): void {
	const document = event.document;
	const documentId = document.uri.toString();

	if (!services.trees.has(documentId) || event.contentChanges.length === 0) {
		return;
	}

	services.trees.applyChanges(documentId, document, event.contentChanges);
}
