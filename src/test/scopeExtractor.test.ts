import * as assert from 'assert';
import * as sinon from 'sinon';
import { extractScopes, scopeSpan, DEFAULT_MIN_LINES } from '../scopeExtractor';
import { ScopeTargetRegistry } from '../scopeTargets';
import { FakeDocument, FakeTree, nodeSpanning, pythonIfSource } from './fakes';

suite('Scope Extractor Tests', () => {
    let registry: ScopeTargetRegistry;

    setup(() => {
        sinon.stub(console, 'log');
        registry = new ScopeTargetRegistry({
            python: ['function_definition', 'if_statement'],
            javascript: ['function_declaration']
        });
    });

    teardown(() => {
        sinon.restore();
    });

    suite('scopeSpan', () => {
        test('should report 1-based lines and their difference', () => {
            const document = new FakeDocument(pythonIfSource(10));
            const node = nodeSpanning(document, 'if_statement', 1, 11);

            assert.deepStrictEqual(scopeSpan(node, document), { startLine: 2, endLine: 12, lineDifference: 10 });
        });
    });

    suite('Threshold', () => {
        test('should annotate a 10-line if block at its closing line with its trimmed opening line', () => {
            const source = pythonIfSource(10);
            const document = new FakeDocument(source);
            const tree = new FakeTree([nodeSpanning(document, 'if_statement', 1, 11)]);

            const records = extractScopes(tree, document, 'python', DEFAULT_MIN_LINES, registry);

            assert.deepStrictEqual(records, [{
                anchorOffset: source.length,
                labelText: 'if ready:',
                startLine: 2,
                endLine: 12
            }]);
        });

        test('should exclude a block whose line difference equals minLines', () => {
            const document = new FakeDocument(pythonIfSource(5));
            const tree = new FakeTree([nodeSpanning(document, 'if_statement', 1, 6)]);

            const records = extractScopes(tree, document, 'python', 5, registry);

            assert.deepStrictEqual(records, []);
        });

        test('should include a block one line past minLines', () => {
            const document = new FakeDocument(pythonIfSource(6));
            const tree = new FakeTree([nodeSpanning(document, 'if_statement', 1, 7)]);

            const records = extractScopes(tree, document, 'python', 5, registry);

            assert.strictEqual(records.length, 1);
            assert.strictEqual(records[0].endLine - records[0].startLine, 6);
        });

        test('should exclude single-line nodes even with minLines 0', () => {
            const document = new FakeDocument('if ready: step(1)');
            const tree = new FakeTree([nodeSpanning(document, 'if_statement', 0, 0)]);

            assert.deepStrictEqual(extractScopes(tree, document, 'python', 0, registry), []);
        });

        test('should include a two-line node with minLines 0', () => {
            const document = new FakeDocument('if ready:\n    step(1)');
            const tree = new FakeTree([nodeSpanning(document, 'if_statement', 0, 1)]);

            const records = extractScopes(tree, document, 'python', 0, registry);

            assert.strictEqual(records.length, 1);
            assert.strictEqual(records[0].labelText, 'if ready:');
        });
    });

    suite('Anchor and label', () => {
        test('should anchor after trailing content on the closing line, not at the node end', () => {
            const lines = ['function f() {', '  a();', '  a();', '  a();', '  a();', '  a();', '  a();', '}  // done'];
            const source = lines.join('\n');
            const document = new FakeDocument(source, 'javascript');
            const node = {
                type: 'function_declaration',
                startIndex: 0,
                endIndex: document.offsetAt({ line: 7, character: 1 }),
                namedChildren: []
            };

            const records = extractScopes(new FakeTree([node]), document, 'javascript', 5, registry);

            assert.strictEqual(records.length, 1);
            assert.strictEqual(records[0].anchorOffset, source.length);
            assert.notStrictEqual(records[0].anchorOffset, node.endIndex);
            assert.strictEqual(records[0].labelText, 'function f() {');
        });

        test('should take the label from the line the node starts on', () => {
            const source = ['x = 1', '    def helper(a,   ', '        b):', '        pass', '', '', '', '', '        return b'].join('\n');
            const document = new FakeDocument(source);
            const tree = new FakeTree([nodeSpanning(document, 'function_definition', 1, 8)]);

            const records = extractScopes(tree, document, 'python', 5, registry);

            assert.strictEqual(records[0].labelText, 'def helper(a,');
        });
    });

    suite('Ordering', () => {
        test('should emit records in reverse of match order for nested blocks', () => {
            const lines: string[] = [];
            for (let i = 0; i < 21; i++) {
                lines.push(`line ${i}`);
            }
            const document = new FakeDocument(lines.join('\n'));
            const outer = nodeSpanning(document, 'if_statement', 0, 19);
            const inner = nodeSpanning(document, 'if_statement', 4, 14);

            const records = extractScopes(new FakeTree([outer, inner]), document, 'python', 5, registry);

            assert.deepStrictEqual(records.map(record => record.labelText), ['line 4', 'line 0']);
            assert.deepStrictEqual(records.map(record => [record.startLine, record.endLine]), [[5, 15], [1, 20]]);
        });

        test('should reverse emission order across different kinds', () => {
            const document = new FakeDocument(pythonIfSource(20));
            const definition = nodeSpanning(document, 'function_definition', 0, 21);
            const conditional = nodeSpanning(document, 'if_statement', 1, 10);

            const records = extractScopes(new FakeTree([definition, conditional]), document, 'python', 5, registry);

            assert.deepStrictEqual(records.map(record => record.labelText), ['if ready:', 'def main():']);
        });
    });

    suite('Query', () => {
        test('should run one query with every registered kind', () => {
            const document = new FakeDocument(pythonIfSource(10));
            const tree = new FakeTree([]);

            extractScopes(tree, document, 'python', 5, registry);

            assert.deepStrictEqual(tree.queriedKinds, [['function_definition', 'if_statement']]);
        });

        test('should ignore nodes of unregistered kinds', () => {
            const document = new FakeDocument(pythonIfSource(10));
            const tree = new FakeTree([nodeSpanning(document, 'while_statement', 1, 11)]);

            assert.deepStrictEqual(extractScopes(tree, document, 'python', 5, registry), []);
        });

        test('should return nothing without querying for an unsupported language', () => {
            const document = new FakeDocument(pythonIfSource(10));
            const tree = new FakeTree([nodeSpanning(document, 'if_statement', 1, 11)]);

            const records = extractScopes(tree, document, 'cobol', 5, registry);

            assert.deepStrictEqual(records, []);
            assert.strictEqual(tree.queriedKinds.length, 0);
        });

        test('should return nothing for a tree without matches', () => {
            const document = new FakeDocument(pythonIfSource(10));

            assert.deepStrictEqual(extractScopes(new FakeTree([]), document, 'python', 5, registry), []);
        });

        test('should log and return nothing when the query cannot be built', () => {
            const errorStub = sinon.stub(console, 'error');
            const document = new FakeDocument(pythonIfSource(10));
            const tree = new FakeTree([nodeSpanning(document, 'if_statement', 1, 11)]);
            tree.failure = new Error('Bad node name');

            const records = extractScopes(tree, document, 'python', 5, registry);

            assert.deepStrictEqual(records, []);
            assert.strictEqual(errorStub.calledOnce, true);
        });
    });
});
