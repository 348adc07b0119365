import type * as vscode from 'vscode';
import { ScopeEchoServices } from './services';

/**
 * Handle when a document is opened - enable scope echo for supported languages and parse it
 */
export async function handleDocumentOpen(document: vscode.TextDocument, services: ScopeEchoServices): Promise<void> {
	const documentId = document.uri.toString();

	if (!services.getConfig().enableByDefault || !services.registry.supports(document.languageId)) {
		return;
	}

	console.log(`[scope-echo] Document opened: ${documentId} (language: ${document.languageId})`);

	// Listeners go in first so the initial parse triggers the first recompute
	services.controller.enable(documentId);
	await ensureParsed(document, services);
}

/**
 * Parse a document unless a tree for it already exists
 */
export async function ensureParsed(document: vscode.TextDocument, services: ScopeEchoServices): Promise<void> {
	const documentId = document.uri.toString();
	if (services.trees.has(documentId)) {
		return;
	}

	const parsed = await services.trees.open(documentId, document);
	if (!parsed) {
		console.log(`[scope-echo] No grammar available for '${document.languageId}', nothing to annotate`);
	}
}

/**
 * Handle when a document is closed - drop its annotations and tree
 */
export function handleDocumentClose(document: vscode.TextDocument, services: ScopeEchoServices): void {
	const documentId = document.uri.toString();
	services.controller.disable(documentId);
	services.trees.close(documentId);
}
