/**
 * Data structures shared by the scope extractor, the annotation renderer and the hosts that feed them
 *
 * Positions and offsets follow the host document: lines are 0-based here and are only reported
 * 1-based in extracted records, offsets are in the same units the host's positionAt accepts.
 */

/**
 * A position in a host document
 */
export interface DocumentPosition {
	readonly line: number;
	readonly character: number;
}

/**
 * A single line of a host document
 */
export interface DocumentLine {
	readonly text: string;
	readonly range: {
		readonly end: DocumentPosition;
	};
}

/**
 * Position mapping supplied by the host editor
 * vscode.TextDocument satisfies this structurally
 */
export interface ScopeDocument {
	readonly lineCount: number;
	positionAt(offset: number): DocumentPosition;
	offsetAt(position: DocumentPosition): number;
	lineAt(line: number): DocumentLine;
}

/**
 * A node of a syntax tree produced by the host's parser, consumed read-only
 */
export interface SyntaxNode {
	readonly type: string;
	readonly startIndex: number;
	readonly endIndex: number;
	readonly namedChildren: readonly SyntaxNode[];
}

/**
 * A parsed document together with its structural query capability
 * One implementation exists per grammar backend
 */
export interface ScopeTree {
	readonly rootNode: SyntaxNode;

	/**
	 * Run one combined query for every kind and return the matched nodes in emission order.
	 * Throws when the query cannot be built for this grammar.
	 */
	query(kinds: readonly string[]): readonly SyntaxNode[];
}

/**
 * An annotation computed by the extractor, discarded once rendered
 */
export interface AnnotationRecord {
	anchorOffset: number;
	labelText: string;
	startLine: number; // 1-based line of the block's opening
	endLine: number;   // 1-based line of the block's closing, where the label is drawn
}

/**
 * Visual style of a rendered annotation
 */
export interface AnnotationStyle {
	color?: string;
	fontStyle?: string;
	fontWeight?: string;
	margin?: string;
}

/**
 * An annotation currently shown by the host, owned by the renderer
 */
export interface RenderedAnnotation<H> {
	readonly handle: H;
	readonly anchorOffset: number;
	readonly labelText: string;
}

/**
 * Annotation resource primitives supplied by the host editor
 */
export interface AnnotationSurface<H> {
	createAnnotation(documentId: string, anchorOffset: number, text: string, style: AnnotationStyle): H;
	destroyAnnotation(documentId: string, handle: H): void;

	/**
	 * Called once a batch of creations or destructions for a document is complete
	 */
	flush(documentId: string): void;
}

/**
 * Something that can be released
 */
export interface Disposable {
	dispose(): void;
}

/**
 * Everything a recompute cycle needs about one document
 */
export interface ScopeSnapshot {
	readonly tree: ScopeTree;
	readonly document: ScopeDocument;
	readonly languageKey: string;
}

/**
 * The two trigger events of the host plus access to the current tree
 */
export interface ScopeEvents {
	onDidParse(documentId: string, listener: () => void): Disposable;
	onDidChange(documentId: string, listener: () => void): Disposable;
	snapshot(documentId: string): ScopeSnapshot | undefined;
}
