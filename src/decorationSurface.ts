import type * as vscode from 'vscode';
import { AnnotationStyle, AnnotationSurface } from './dataStructures';

/**
 * The parts of vscode.window the surface draws through
 */
export type DecorationWindow = Pick<typeof vscode.window, 'createTextEditorDecorationType' | 'visibleTextEditors'>;

interface PendingDecoration {
	anchorOffset: number;
	text: string;
	style: AnnotationStyle;
}

/**
 * Annotation surface backed by editor decorations.
 * Every annotation is an `after` attachment on a zero-width range at its anchor;
 * all annotations of a document share one decoration type and are pushed per editor on flush.
 */
export class DecorationSurface implements AnnotationSurface<number> {
	private decorationType: vscode.TextEditorDecorationType | undefined;
	private readonly documents = new Map<string, Map<number, PendingDecoration>>();
	private nextHandle = 1;

	constructor(private readonly window: DecorationWindow) {}

	public createAnnotation(documentId: string, anchorOffset: number, text: string, style: AnnotationStyle): number {
		let decorations = this.documents.get(documentId);
		if (!decorations) {
			decorations = new Map();
			this.documents.set(documentId, decorations);
		}

		const handle = this.nextHandle++;
		decorations.set(handle, { anchorOffset, text, style });
		return handle;
	}

	public destroyAnnotation(documentId: string, handle: number): void {
		const decorations = this.documents.get(documentId);
		decorations?.delete(handle);
		if (decorations?.size === 0) {
			this.documents.delete(documentId);
		}
	}

	/**
	 * Push the current annotations of a document to every visible editor showing it
	 */
	public flush(documentId: string): void {
		for (const editor of this.window.visibleTextEditors) {
			if (editor.document.uri.toString() === documentId) {
				this.paint(editor);
			}
		}
	}

	/**
	 * Paint one editor, e.g. when it becomes visible
	 */
	public paint(editor: vscode.TextEditor): void {
		const decorationType = this.ensureDecorationType();
		const pending = this.documents.get(editor.document.uri.toString());
		const document = editor.document;
		const options: vscode.DecorationOptions[] = [];

		for (const decoration of pending?.values() ?? []) {
			const position = document.positionAt(decoration.anchorOffset);
			options.push({
				range: document.lineAt(position.line).range.with(position, position),
				renderOptions: {
					after: {
						contentText: decoration.text,
						color: decoration.style.color,
						fontStyle: decoration.style.fontStyle,
						fontWeight: decoration.style.fontWeight,
						margin: decoration.style.margin
					}
				}
			});
		}

		editor.setDecorations(decorationType, options);
	}

	public dispose(): void {
		this.decorationType?.dispose();
		this.decorationType = undefined;
		this.documents.clear();
	}

	private ensureDecorationType(): vscode.TextEditorDecorationType {
		if (!this.decorationType) {
			this.decorationType = this.window.createTextEditorDecorationType({});
			console.log('[scope-echo] Created scope annotation decoration type');
		}
		return this.decorationType;
	}
}
