import { describe, it, expect } from 'vitest';
import { truncate } from '../src/processors/truncate.js';
import { compilePattern, redactSecrets } from '../src/processors/redact-secrets.js';
import { extractFunctions } from '../src/processors/extract-functions.js';
import { createBuiltinRegistry, ProcessorRegistry } from '../src/processors/processor-registry.js';
import { InvalidProcessorNameError, ValidationError } from '../src/errors/index.js';

const py = { path: 'lib/util.py', extension: '.py' };
const js = { path: 'src/util.js', extension: '.js' };
const txt = { path: 'notes.txt', extension: '.txt' };

describe('truncate', () => {
    it('defaults to 1000 characters', () => {
        expect(truncate('x'.repeat(1001), {}, txt)).toBe(`${'x'.repeat(1000)}\n... (truncated at 1000 chars)`);
    });

    it('cuts by lines when max_lines is given', () => {
        expect(truncate('a\nb\nc', { max_lines: 2 }, txt)).toBe('a\nb\n... (truncated after 2 lines)');
    });

    it('does not count a trailing newline as a line', () => {
        expect(truncate('a\nb\n', { max_lines: 2 }, txt)).toBe('a\nb\n');
        expect(truncate('a\nb\nc\n', { max_lines: 2 }, txt)).toBe('a\nb\n... (truncated after 2 lines)');
    });

    it('can leave out the marker', () => {
        expect(truncate('abcdef', { max_chars: 3, add_marker: false }, txt)).toBe('abc');
    });

    it('leaves short content alone', () => {
        expect(truncate('abc', { max_chars: 3 }, txt)).toBe('abc');
    });

    it('rejects unknown arguments', () => {
        expect(() => truncate('abc', { chars: 3 }, txt)).toThrow(ValidationError);
    });
});

describe('redactSecrets', () => {
    it('redacts assignments and bearer tokens by default', () => {
        const input = 'api_key = "test-secret"\nAuthorization: Bearer test-token';
        expect(redactSecrets(input, {}, txt)).toBe('[REDACTED]\nAuthorization: [REDACTED]');
    });

    it('uses the configured patterns and replacement', () => {
        expect(redactSecrets('pin 1234', { patterns: ['\\d{4}'], replacement: '####' }, txt)).toBe('pin ####');
    });

    it('turns a leading (?i) into the i flag', () => {
        const pattern = compilePattern('(?i)secret');
        expect(pattern.flags).toBe('gi');
        expect(pattern.source).toBe('secret');
    });
});

describe('extractFunctions', () => {
    const pySource = [
        'import os',
        '',
        'def add(a, b):',
        '    """Add two numbers."""',
        '    return a + b',
        '',
        'x = 1',
        '',
        '@cache',
        'def mul(a, b):',
        '    return a * b',
        '',
    ].join('\n');

    it('keeps Python functions with decorators and docstrings', () => {
        expect(extractFunctions(pySource, {}, py)).toBe(
            'def add(a, b):\n    """Add two numbers."""\n    return a + b\n\n@cache\ndef mul(a, b):\n    return a * b'
        );
    });

    it('can drop docstrings', () => {
        expect(extractFunctions(pySource, { include_docstrings: false }, py)).toBe(
            'def add(a, b):\n    return a + b\n\n@cache\ndef mul(a, b):\n    return a * b'
        );
    });

    it('keeps JavaScript functions and arrow functions', () => {
        const source = [
            "import x from 'y';",
            '',
            '/** Adds. */',
            'export function add(a, b) {',
            '  const s = "}";',
            '  return a + b;',
            '}',
            '',
            'const double = (n) => n * 2;',
            '',
            'let value = 3;',
        ].join('\n');
        expect(extractFunctions(source, {}, js)).toBe(
            '/** Adds. */\nexport function add(a, b) {\n  const s = "}";\n  return a + b;\n}\n\nconst double = (n) => n * 2;'
        );
    });

    it('says so when a file has no functions', () => {
        expect(extractFunctions('x = 1\n', {}, py)).toBe('# No functions found');
    });

    it('passes through languages that were not selected', () => {
        expect(extractFunctions('function f() {}', { languages: ['python'] }, js)).toBe('function f() {}');
        expect(extractFunctions('def f; end', {}, { path: 'a.rb', extension: '.rb' })).toBe('def f; end');
    });
});

describe('ProcessorRegistry', () => {
    it('lists built-in processors by name', () => {
        expect(createBuiltinRegistry().getRegisteredNames()).toEqual(['extract_functions', 'redact_secrets', 'truncate']);
    });

    it('refuses names outside [A-Za-z0-9_]', () => {
        expect(() => new ProcessorRegistry().register('../evil', (content) => content)).toThrow(InvalidProcessorNameError);
    });

    it('refuses duplicate names', () => {
        const registry = new ProcessorRegistry();
        registry.register('same', (content) => content);
        expect(() => registry.register('same', (content) => content)).toThrow("Processor 'same' is already registered");
    });
});
