import { AnnotationRecord, ScopeDocument, ScopeTree, SyntaxNode } from './dataStructures';
import { ScopeTargetRegistry } from './scopeTargets';

/**
 * Scope extraction: turn the matched nodes of a syntax tree into annotation records
 */

export const DEFAULT_MIN_LINES = 5;

/**
 * Line span of a matched node, 1-based
 */
export interface ScopeSpan {
	startLine: number;
	endLine: number;
	lineDifference: number;
}

/**
 * Compute the 1-based start and end lines of a node through the host's position mapping
 */
export function scopeSpan(node: SyntaxNode, document: ScopeDocument): ScopeSpan {
	const startLine = document.positionAt(node.startIndex).line + 1;
	const endLine = document.positionAt(node.endIndex).line + 1;
	return { startLine, endLine, lineDifference: endLine - startLine };
}

/**
 * Build the annotation for one node: anchored at the end of its closing line,
 * labelled with its trimmed opening line
 */
export function annotationFor(node: SyntaxNode, document: ScopeDocument, span: ScopeSpan): AnnotationRecord {
	const closingLine = document.lineAt(span.endLine - 1);
	return {
		anchorOffset: document.offsetAt(closingLine.range.end),
		labelText: document.lineAt(span.startLine - 1).text.trim(),
		startLine: span.startLine,
		endLine: span.endLine
	};
}

/**
 * Extract the annotation records of a tree.
 *
 * Only nodes spanning strictly more than minLines lines are kept. Records come out in the
 * reverse of the query's emission order, so the renderer installs them bottom-up relative
 * to the match order.
 */
export function extractScopes(
	tree: ScopeTree,
	document: ScopeDocument,
	languageKey: string,
	minLines: number,
	registry: ScopeTargetRegistry
): AnnotationRecord[] {
	const kinds = registry.targetsFor(languageKey);
	if (kinds.length === 0) {
		return [];
	}

	try {
		const matches = tree.query(kinds);
		const records: AnnotationRecord[] = [];

		for (let i = matches.length - 1; i >= 0; i--) {
			const node = matches[i];
			const span = scopeSpan(node, document);
			if (span.lineDifference > minLines) {
				records.push(annotationFor(node, document, span));
			}
		}

		return records;
	} catch (error) {
		console.error(`[scope-echo] Failed to extract scopes for language '${languageKey}':`, error);
		return [];
	}
}
