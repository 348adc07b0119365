import {
	AnnotationRecord,
	AnnotationStyle,
	AnnotationSurface,
	RenderedAnnotation,
	ScopeDocument,
	ScopeTree
} from './dataStructures';
import { extractScopes } from './scopeExtractor';
import { ScopeTargetRegistry } from './scopeTargets';

/**
 * Rendering options taken from configuration
 */
export interface RendererOptions {
	overlayPrefix: string;
	style: AnnotationStyle;
	deduplicateAnchors: boolean;
}

/**
 * Owns the rendered annotations of every open document.
 *
 * Each recompute cycle releases everything tracked for the document and installs the
 * freshly extracted set; nothing is diffed.
 */
export class AnnotationRenderer<H> {
	private readonly tracked = new Map<string, RenderedAnnotation<H>[]>();

	constructor(
		private readonly surface: AnnotationSurface<H>,
		private readonly registry: ScopeTargetRegistry,
		private options: RendererOptions
	) {}

	public updateOptions(options: RendererOptions): void {
		this.options = options;
	}

	/**
	 * Release every annotation tracked for a document. No-op when nothing is tracked.
	 */
	public clearAll(documentId: string): void {
		if (this.release(documentId) > 0) {
			this.surface.flush(documentId);
		}
	}

	/**
	 * Render records for a document and track the resulting handles
	 */
	public install(documentId: string, records: readonly AnnotationRecord[]): void {
		try {
			this.place(documentId, records);
		} finally {
			if (records.length > 0) {
				this.surface.flush(documentId);
			}
		}
	}

	/**
	 * Clear, extract and install in one cycle. Never throws: a failure leaves the document
	 * with whatever was installed before it, still tracked.
	 */
	public recompute(
		documentId: string,
		tree: ScopeTree,
		document: ScopeDocument,
		languageKey: string,
		minLines: number
	): void {
		let changed = false;
		try {
			changed = this.release(documentId) > 0;
			const records = extractScopes(tree, document, languageKey, minLines, this.registry);
			changed = this.place(documentId, records) > 0 || changed;
		} catch (error) {
			changed = true;
			console.error(`[scope-echo] Recompute failed for ${documentId}:`, error);
		}

		if (changed) {
			try {
				this.surface.flush(documentId);
			} catch (error) {
				console.error(`[scope-echo] Failed to repaint ${documentId}:`, error);
			}
		}
	}

	/**
	 * Annotations currently tracked for a document
	 */
	public trackedAnnotations(documentId: string): readonly RenderedAnnotation<H>[] {
		return [...(this.tracked.get(documentId) ?? [])];
	}

	public trackedDocuments(): string[] {
		return [...this.tracked.keys()];
	}

	public dispose(): void {
		for (const documentId of this.trackedDocuments()) {
			this.clearAll(documentId);
		}
	}

	private release(documentId: string): number {
		const annotations = this.tracked.get(documentId);
		this.tracked.delete(documentId);
		if (!annotations) {
			return 0;
		}

		for (const annotation of annotations) {
			try {
				this.surface.destroyAnnotation(documentId, annotation.handle);
			} catch (error) {
				console.error(`[scope-echo] Failed to remove annotation at ${annotation.anchorOffset}:`, error);
			}
		}
		return annotations.length;
	}

	private place(documentId: string, records: readonly AnnotationRecord[]): number {
		if (records.length === 0) {
			return 0;
		}

		let annotations = this.tracked.get(documentId);
		if (!annotations) {
			annotations = [];
			this.tracked.set(documentId, annotations);
		}

		const { overlayPrefix, style, deduplicateAnchors } = this.options;
		const anchors = new Set(annotations.map(annotation => annotation.anchorOffset));
		let placed = 0;

		for (const record of records) {
			if (deduplicateAnchors && anchors.has(record.anchorOffset)) {
				continue;
			}

			const handle = this.surface.createAnnotation(
				documentId,
				record.anchorOffset,
				overlayPrefix + record.labelText,
				style
			);
			annotations.push({ handle, anchorOffset: record.anchorOffset, labelText: record.labelText });
			anchors.add(record.anchorOffset);
			placed++;
		}

		return placed;
	}
}
