import type Parser from 'web-tree-sitter';
import { Disposable, DocumentPosition, ScopeDocument, ScopeEvents, ScopeSnapshot } from './dataStructures';
import { GrammarLoader, ScopeQueryCache, TreeSitterScopeTree } from './treeSitterBackend';

/**
 * A document whose text can be parsed; vscode.TextDocument satisfies this
 */
export interface ParsableDocument extends ScopeDocument {
	readonly languageId: string;
	getText(): string;
}

/**
 * A content change as reported by the editor (vscode.TextDocumentContentChangeEvent)
 */
export interface DocumentEdit {
	readonly range: {
		readonly start: DocumentPosition;
		readonly end: DocumentPosition;
	};
	readonly rangeOffset: number;
	readonly rangeLength: number;
	readonly text: string;
}

interface TreeEntry {
	tree: Parser.Tree;
	language: Parser.Language;
	document: ParsableDocument;
	languageKey: string;
}

/**
 * Convert an editor change into a tree-sitter edit
 */
export function toTreeEdit(change: DocumentEdit): Parser.Edit {
	const start = change.range.start;
	const insertedLines = change.text.split('\n');
	const lastInserted = insertedLines[insertedLines.length - 1];

	return {
		startIndex: change.rangeOffset,
		oldEndIndex: change.rangeOffset + change.rangeLength,
		newEndIndex: change.rangeOffset + change.text.length,
		startPosition: { row: start.line, column: start.character },
		oldEndPosition: { row: change.range.end.line, column: change.range.end.character },
		newEndPosition: insertedLines.length === 1
			? { row: start.line, column: start.character + lastInserted.length }
			: { row: start.line + insertedLines.length - 1, column: lastInserted.length }
	};
}

/**
 * Keeps one syntax tree per open document up to date and announces
 * when a document was first parsed and when it changed
 */
export class DocumentTrees implements ScopeEvents {
	private readonly entries = new Map<string, TreeEntry>();
	private readonly parseListeners = new Map<string, Set<() => void>>();
	private readonly changeListeners = new Map<string, Set<() => void>>();
	private readonly queries = new ScopeQueryCache();
	// Latest pending open per document; close() drops it so a late grammar load is discarded
	private readonly pendingOpens = new Map<string, number>();
	private nextOpen = 0;

	constructor(private readonly grammars: GrammarLoader) {}

	public has(documentId: string): boolean {
		return this.entries.has(documentId);
	}

	/**
	 * Parse a document from scratch and fire its "parsed" listeners.
	 * Returns false when no grammar is available for its language, or when the document was
	 * closed or opened again while its grammar loaded.
	 */
	public async open(documentId: string, document: ParsableDocument): Promise<boolean> {
		const openId = ++this.nextOpen;
		this.pendingOpens.set(documentId, openId);

		const language = await this.grammars.languageFor(document.languageId);
		if (this.pendingOpens.get(documentId) !== openId) {
			console.log(`[scope-echo] Dropped stale parse of ${documentId}`);
			return false;
		}
		this.pendingOpens.delete(documentId);
		if (!language) {
			return false;
		}

		const tree = this.grammars.parse(language, document.getText());
		this.entries.get(documentId)?.tree.delete();
		this.entries.set(documentId, { tree, language, document, languageKey: document.languageId });

		console.log(`[scope-echo] Parsed ${documentId} (${document.languageId})`);
		this.fire(this.parseListeners, documentId);
		return true;
	}

	/**
	 * Apply editor changes to the stored tree, reparse incrementally and fire "changed" listeners
	 */
	public applyChanges(documentId: string, document: ParsableDocument, changes: readonly DocumentEdit[]): void {
		const entry = this.entries.get(documentId);
		if (!entry || changes.length === 0) {
			return;
		}

		for (const change of changes) {
			entry.tree.edit(toTreeEdit(change));
		}

		const tree = this.grammars.parse(entry.language, document.getText(), entry.tree);
		entry.tree.delete();
		entry.tree = tree;
		entry.document = document;
		this.fire(this.changeListeners, documentId);
	}

	public close(documentId: string): void {
		this.pendingOpens.delete(documentId);
		this.entries.get(documentId)?.tree.delete();
		this.entries.delete(documentId);
	}

	public snapshot(documentId: string): ScopeSnapshot | undefined {
		const entry = this.entries.get(documentId);
		if (!entry) {
			return undefined;
		}
		return {
			tree: new TreeSitterScopeTree(entry.tree, entry.language, entry.languageKey, this.queries),
			document: entry.document,
			languageKey: entry.languageKey
		};
	}

	public onDidParse(documentId: string, listener: () => void): Disposable {
		return this.listen(this.parseListeners, documentId, listener);
	}

	public onDidChange(documentId: string, listener: () => void): Disposable {
		return this.listen(this.changeListeners, documentId, listener);
	}

	/**
	 * Drop compiled queries, e.g. after the scope targets were reloaded
	 */
	public resetQueries(): void {
		this.queries.clear();
	}

	public dispose(): void {
		[...this.entries.keys()].forEach(documentId => this.close(documentId));
		this.pendingOpens.clear();
		this.parseListeners.clear();
		this.changeListeners.clear();
		this.queries.clear();
	}

	private listen(listeners: Map<string, Set<() => void>>, documentId: string, listener: () => void): Disposable {
		const documentListeners = listeners.get(documentId) ?? new Set<() => void>();
		listeners.set(documentId, documentListeners);
		documentListeners.add(listener);

		return {
			dispose: () => {
				documentListeners.delete(listener);
				if (documentListeners.size === 0 && listeners.get(documentId) === documentListeners) {
					listeners.delete(documentId);
				}
			}
		};
	}

	private fire(listeners: Map<string, Set<() => void>>, documentId: string): void {
		for (const listener of [...(listeners.get(documentId) ?? [])]) {
			try {
				listener();
			} catch (error) {
				console.error(`[scope-echo] Listener failed for ${documentId}:`, error);
			}
		}
	}
}
