import builtinTargets from './scopeTargets.json';

/**
 * Language key -> ordered set of syntax node kinds that count as scopes
 */
export type ScopeTargetTable = Readonly<Record<string, readonly string[]>>;

/**
 * Language key -> grammar file name inside tree-sitter-wasms
 */
export type GrammarTable = Readonly<Record<string, string>>;

const NO_TARGETS: readonly string[] = Object.freeze([]);
const FALLBACK_LANGUAGE_KEY = /^[A-Za-z0-9_-]+$/;

/**
 * Scope kinds shipped with the extension, keyed by VS Code language id
 */
export function builtinScopeTargets(): ScopeTargetTable {
	const table: Record<string, readonly string[]> = {};
	for (const [languageKey, entry] of Object.entries(builtinTargets.languages)) {
		table[languageKey] = entry.scopes;
	}
	return table;
}

/**
 * Grammar file (inside tree-sitter-wasms) used to parse a language, if one ships
 */
export function grammarFileFor(languageKey: string): string | undefined {
	for (const [key, entry] of Object.entries(builtinTargets.languages)) {
		if (key === languageKey) {
			return entry.grammar;
		}
	}
	return undefined;
}

/**
 * Central lookup of scope kinds per language.
 * User entries replace the built-in list for their language; an empty list turns a language off.
 */
export class ScopeTargetRegistry {
	private table = new Map<string, readonly string[]>();
	private grammars: GrammarTable = {};

	constructor(private readonly builtin: ScopeTargetTable, overrides: ScopeTargetTable = {}, grammars: GrammarTable = {}) {
		this.reload(overrides, grammars);
	}

	/**
	 * Kinds registered for a language; unknown languages have none
	 */
	public targetsFor(languageKey: string): readonly string[] {
		return this.table.get(languageKey) ?? NO_TARGETS;
	}

	/**
	 * Whether any kind is registered for a language
	 */
	public supports(languageKey: string): boolean {
		return this.targetsFor(languageKey).length > 0;
	}

	/**
	 * Grammar file for a supported language: a configured one first, then the shipped one,
	 * then tree-sitter-wasms' own naming (`tree-sitter-<key>.wasm`, dashes as underscores)
	 */
	public grammarFor(languageKey: string): string | undefined {
		if (!this.supports(languageKey)) {
			return undefined;
		}
		const grammar = this.grammars[languageKey] ?? grammarFileFor(languageKey);
		if (grammar) {
			return grammar;
		}
		return FALLBACK_LANGUAGE_KEY.test(languageKey)
			? `tree-sitter-${languageKey.replace(/-/g, '_')}.wasm`
			: undefined;
	}

	public languages(): string[] {
		return [...this.table.keys()].filter(key => this.supports(key)).sort();
	}

	/**
	 * Rebuild the table from the built-ins and a fresh set of user overrides
	 */
	public reload(overrides: ScopeTargetTable, grammars: GrammarTable = {}): void {
		const table = new Map<string, readonly string[]>();
		for (const [languageKey, kinds] of Object.entries(this.builtin)) {
			table.set(languageKey, toOrderedSet(kinds));
		}
		for (const [languageKey, kinds] of Object.entries(overrides)) {
			table.set(languageKey, toOrderedSet(kinds));
		}
		this.table = table;
		this.grammars = { ...grammars };

		console.log(`[scope-echo] Scope targets loaded for ${this.languages().length} languages`);
	}
}

function toOrderedSet(kinds: readonly string[]): readonly string[] {
	return Object.freeze([...new Set(kinds.map(kind => kind.trim()).filter(kind => kind.length > 0))]);
}
