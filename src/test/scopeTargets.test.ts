import * as assert from 'assert';
import * as sinon from 'sinon';
import { ScopeTargetRegistry, builtinScopeTargets, grammarFileFor } from '../scopeTargets';

suite('Scope Target Registry Tests', () => {
    setup(() => {
        sinon.stub(console, 'log');
    });

    teardown(() => {
        sinon.restore();
    });

    suite('targetsFor', () => {
        test('should return the built-in kinds of a registered language in order', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets());

            const kinds = registry.targetsFor('python');

            assert.deepStrictEqual(kinds.slice(0, 3), ['class_definition', 'function_definition', 'if_statement']);
            assert.ok(kinds.includes('for_statement'));
        });

        test('should return an empty list for an unregistered language', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets());

            assert.deepStrictEqual(registry.targetsFor('cobol'), []);
            assert.deepStrictEqual(registry.targetsFor(''), []);
            assert.strictEqual(registry.supports('cobol'), false);
        });

        test('should keep grammar vocabulary per language', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets());

            assert.ok(registry.targetsFor('python').includes('if_statement'));
            assert.ok(registry.targetsFor('rust').includes('if_expression'));
            assert.ok(!registry.targetsFor('rust').includes('if_statement'));
        });
    });

    suite('overrides', () => {
        test('should replace the built-in list of an overridden language', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets(), {
                python: ['function_definition']
            });

            assert.deepStrictEqual(registry.targetsFor('python'), ['function_definition']);
        });

        test('should register languages unknown to the built-in table', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets(), {
                elixir: ['do_block']
            });

            assert.deepStrictEqual(registry.targetsFor('elixir'), ['do_block']);
            assert.ok(registry.languages().includes('elixir'));
        });

        test('should turn a language off with an empty list', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets(), { python: [] });

            assert.strictEqual(registry.supports('python'), false);
            assert.ok(!registry.languages().includes('python'));
        });

        test('should trim kinds and drop duplicates and blanks, keeping first-seen order', () => {
            const registry = new ScopeTargetRegistry({}, {
                python: ['if_statement', ' for_statement ', 'if_statement', '', 'for_statement']
            });

            assert.deepStrictEqual(registry.targetsFor('python'), ['if_statement', 'for_statement']);
        });

        test('should discard previous overrides on reload', () => {
            const registry = new ScopeTargetRegistry({ python: ['if_statement'] }, { python: ['for_statement'] });

            registry.reload({});

            assert.deepStrictEqual(registry.targetsFor('python'), ['if_statement']);
        });
    });

    suite('grammarFileFor', () => {
        test('should name the grammar shipped for a language', () => {
            assert.strictEqual(grammarFileFor('python'), 'tree-sitter-python.wasm');
            assert.strictEqual(grammarFileFor('typescriptreact'), 'tree-sitter-tsx.wasm');
        });

        test('should return undefined when no grammar ships', () => {
            assert.strictEqual(grammarFileFor('cobol'), undefined);
        });
    });

    suite('grammarFor', () => {
        test('should use the shipped grammar of a built-in language', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets());

            assert.strictEqual(registry.grammarFor('csharp'), 'tree-sitter-c_sharp.wasm');
        });

        test('should prefer a configured grammar', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets(), {}, { python: 'tree-sitter-custom_python.wasm' });

            assert.strictEqual(registry.grammarFor('python'), 'tree-sitter-custom_python.wasm');
        });

        test('should fall back to the tree-sitter-wasms file name of a user-added language', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets(), {
                lua: ['function_declaration'],
                'objective-c': ['method_definition']
            });

            assert.strictEqual(registry.grammarFor('lua'), 'tree-sitter-lua.wasm');
            assert.strictEqual(registry.grammarFor('objective-c'), 'tree-sitter-objective_c.wasm');
        });

        test('should not name a grammar for a language without targets', () => {
            const registry = new ScopeTargetRegistry(builtinScopeTargets(), { python: [] }, { lua: 'tree-sitter-lua.wasm' });

            assert.strictEqual(registry.grammarFor('python'), undefined);
            assert.strictEqual(registry.grammarFor('lua'), undefined);
        });

        test('should not derive a file name from a key with path characters', () => {
            const registry = new ScopeTargetRegistry({}, { '../lua': ['function_declaration'] });

            assert.strictEqual(registry.grammarFor('../lua'), undefined);
        });

        test('should drop configured grammars on reload', () => {
            const registry = new ScopeTargetRegistry({}, { lua: ['function_declaration'] }, { lua: 'tree-sitter-luau.wasm' });

            registry.reload({ lua: ['function_declaration'] });

            assert.strictEqual(registry.grammarFor('lua'), 'tree-sitter-lua.wasm');
        });
    });

    test('should list supported languages sorted', () => {
        const registry = new ScopeTargetRegistry({ rust: ['function_item'], go: ['function_declaration'], c: [] });

        assert.deepStrictEqual(registry.languages(), ['go', 'rust']);
    });
});
