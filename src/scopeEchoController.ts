import { Disposable, ScopeEvents } from './dataStructures';
import { AnnotationRenderer } from './annotationRenderer';

/**
 * Per-document switch for scope echo.
 * Enabling wires the "parsed" and "changed" events of a document to a recompute;
 * disabling unwires them and clears whatever is shown.
 */
export class ScopeEchoController<H> {
	private readonly subscriptions = new Map<string, Disposable[]>();

	constructor(
		private readonly renderer: AnnotationRenderer<H>,
		private readonly events: ScopeEvents,
		private readonly getMinLines: () => number
	) {}

	public isEnabled(documentId: string): boolean {
		return this.subscriptions.has(documentId);
	}

	public enabledDocuments(): string[] {
		return [...this.subscriptions.keys()];
	}

	public enable(documentId: string): void {
		if (this.isEnabled(documentId)) {
			return;
		}

		const recompute = () => this.recompute(documentId);
		this.subscriptions.set(documentId, [
			this.events.onDidParse(documentId, recompute),
			this.events.onDidChange(documentId, recompute)
		]);
		console.log(`[scope-echo] Enabled for ${documentId}`);

		// A tree may already exist, e.g. when re-enabling after a disable
		this.recompute(documentId);
	}

	public disable(documentId: string): void {
		const disposables = this.subscriptions.get(documentId);
		if (!disposables) {
			return;
		}

		this.subscriptions.delete(documentId);
		disposables.forEach(disposable => disposable.dispose());
		this.renderer.clearAll(documentId);
		console.log(`[scope-echo] Disabled for ${documentId}`);
	}

	/**
	 * Flip the state of a document and return the new one
	 */
	public toggle(documentId: string): boolean {
		if (this.isEnabled(documentId)) {
			this.disable(documentId);
			return false;
		}
		this.enable(documentId);
		return true;
	}

	/**
	 * Recompute every enabled document, e.g. after the configuration changed
	 */
	public refreshAll(): void {
		this.enabledDocuments().forEach(documentId => this.recompute(documentId));
	}

	public dispose(): void {
		this.enabledDocuments().forEach(documentId => this.disable(documentId));
	}

	private recompute(documentId: string): void {
		const snapshot = this.events.snapshot(documentId);
		if (!snapshot) {
			return;
		}

		this.renderer.recompute(
			documentId,
			snapshot.tree,
			snapshot.document,
			snapshot.languageKey,
			this.getMinLines()
		);
	}
}
