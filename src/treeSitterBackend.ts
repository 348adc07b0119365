import * as fs from 'fs';
import * as path from 'path';
import Parser from 'web-tree-sitter';
import { ScopeTree, SyntaxNode } from './dataStructures';
import { grammarFileFor } from './scopeTargets';

/**
 * web-tree-sitter backend: grammar loading, parsing and the combined scope query
 */

const SCOPE_CAPTURE = 'scope';
const NODE_KIND = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build a single alternation query capturing every kind, so all kinds are matched in
 * one traversal and come back in document order
 */
export function buildScopeQuery(kinds: readonly string[]): string {
	const patterns = kinds.filter(kind => NODE_KIND.test(kind)).map(kind => `(${kind})`);
	if (patterns.length === 0) {
		throw new Error(`No valid node kinds in [${kinds.join(', ')}]`);
	}
	return `[${patterns.join(' ')}] @${SCOPE_CAPTURE}`;
}

/**
 * Directory holding the prebuilt grammars of tree-sitter-wasms
 */
export function defaultGrammarDirectory(): string {
	return path.join(path.dirname(require.resolve('tree-sitter-wasms/package.json')), 'out');
}

/**
 * Compiled queries per language and kind list.
 * A failed build is retried on every call but logged only once per key until cleared.
 */
export class ScopeQueryCache {
	private readonly queries = new Map<string, Parser.Query>();
	private readonly failures = new Set<string>();

	public get(languageKey: string, language: Parser.Language, kinds: readonly string[]): Parser.Query | undefined {
		const key = `${languageKey}\u0000${kinds.join(',')}`;
		const cached = this.queries.get(key);
		if (cached) {
			return cached;
		}

		try {
			const query = language.query(buildScopeQuery(kinds));
			this.queries.set(key, query);
			this.failures.delete(key);
			return query;
		} catch (error) {
			if (!this.failures.has(key)) {
				this.failures.add(key);
				console.error(`[scope-echo] Failed to build scope query for '${languageKey}':`, error);
			}
			return undefined;
		}
	}

	public clear(): void {
		this.queries.forEach(query => query.delete());
		this.queries.clear();
		this.failures.clear();
	}
}

/**
 * A tree-sitter tree exposed through the scope query capability
 */
export class TreeSitterScopeTree implements ScopeTree {
	constructor(
		private readonly tree: Parser.Tree,
		private readonly language: Parser.Language,
		private readonly languageKey: string,
		private readonly queries: ScopeQueryCache
	) {}

	get rootNode(): SyntaxNode {
		return this.tree.rootNode;
	}

	public query(kinds: readonly string[]): readonly SyntaxNode[] {
		const query = this.queries.get(this.languageKey, this.language, kinds);
		const nodes: SyntaxNode[] = [];
		if (!query) {
			return nodes;
		}
		for (const match of query.matches(this.tree.rootNode)) {
			for (const capture of match.captures) {
				if (capture.name === SCOPE_CAPTURE) {
					nodes.push(capture.node);
				}
			}
		}
		return nodes;
	}
}

/**
 * Maps a language key to its grammar file name, if it has one
 */
export type GrammarResolver = (languageKey: string) => string | undefined;

/**
 * Loads grammars lazily and owns the shared parser
 */
export class GrammarLoader {
	private parser: Parser | null = null;
	private initializing: Promise<Parser> | null = null;
	private readonly languages = new Map<string, Parser.Language>();
	private readonly unavailable = new Set<string>();
	// web-tree-sitter keeps global state while a grammar loads, so loads run one at a time
	private loading: Promise<unknown> = Promise.resolve();

	constructor(
		private readonly resolveGrammar: GrammarResolver = grammarFileFor,
		private readonly grammarDirectory: string = defaultGrammarDirectory()
	) {}

	/**
	 * Grammar for a language, or undefined when none ships or loading failed
	 */
	public async languageFor(languageKey: string): Promise<Parser.Language | undefined> {
		const loaded = this.languages.get(languageKey);
		if (loaded || this.unavailable.has(languageKey)) {
			return loaded;
		}

		const grammarFile = this.resolveGrammar(languageKey);
		if (!grammarFile) {
			this.unavailable.add(languageKey);
			return undefined;
		}

		await this.ensureParser();
		const next = this.loading.then(() => this.load(languageKey, grammarFile));
		this.loading = next;
		return next;
	}

	/**
	 * Parse text, reusing an edited old tree when one is given.
	 * Synchronous, so edits and reparses of one document never interleave.
	 */
	public parse(language: Parser.Language, text: string, oldTree?: Parser.Tree): Parser.Tree {
		if (!this.parser) {
			throw new Error('Parser not initialized. Load a grammar with languageFor() first.');
		}
		this.parser.setLanguage(language);
		return this.parser.parse(text, oldTree);
	}

	/**
	 * Forget loaded and missing grammars so the next lookup resolves again,
	 * e.g. after the grammar mapping was reconfigured. Existing trees keep their grammar.
	 */
	public resetLanguages(): void {
		this.languages.clear();
		this.unavailable.clear();
	}

	public dispose(): void {
		this.parser?.delete();
		this.parser = null;
		this.initializing = null;
		this.languages.clear();
		this.unavailable.clear();
	}

	private async load(languageKey: string, grammarFile: string): Promise<Parser.Language | undefined> {
		const existing = this.languages.get(languageKey);
		if (existing) {
			return existing;
		}

		const grammarPath = path.join(this.grammarDirectory, grammarFile);
		if (!fs.existsSync(grammarPath)) {
			console.warn(`[scope-echo] No grammar ${grammarFile} for ${languageKey}`);
			this.unavailable.add(languageKey);
			return undefined;
		}

		try {
			const language = await Parser.Language.load(grammarPath);
			this.languages.set(languageKey, language);
			console.log(`[scope-echo] Loaded ${grammarFile} for ${languageKey}`);
			return language;
		} catch (error) {
			// Log but keep going - other languages still work
			console.error(`[scope-echo] Failed to load ${languageKey} grammar:`, error);
			this.unavailable.add(languageKey);
			return undefined;
		}
	}

	private ensureParser(): Promise<Parser> {
		if (!this.initializing) {
			this.initializing = Parser.init().then(() => {
				this.parser = new Parser();
				return this.parser;
			});
		}
		return this.initializing;
	}
}
