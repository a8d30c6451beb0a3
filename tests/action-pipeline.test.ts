import { describe, it, expect } from 'vitest';
import { ActionPipeline } from '../src/actions/action-pipeline.js';
import { ProcessorExecutionError, UnknownProcessorError } from '../src/errors/index.js';
import { createBuiltinRegistry, ProcessorRegistry } from '../src/processors/processor-registry.js';
import { ActionName } from '../src/presets/types.js';
import { settingsWith } from './utils.js';

const match = { group: 'g', rule: 'r', fallback: false };

describe('ActionPipeline', () => {
    const pipeline = new ActionPipeline();

    it('runs the resolved actions', () => {
        const settings = settingsWith({ actions: [ActionName.StripComments] });
        expect(pipeline.apply('// c\nvar x=1;', settings, { path: 'app.js', extension: '.js' })).toEqual({
            ok: true,
            content: 'var x=1;',
            actionsRun: ['strip_comments'],
        });
    });

    it('truncates by max_lines even with no actions', () => {
        const content = ['l1', 'l2', 'l3', 'l4', 'l5', 'l6', 'l7', 'l8'].join('\n');
        const result = pipeline.apply(content, settingsWith({ maxLines: 5 }), { path: 'a.txt', extension: '.txt' });
        expect(result).toEqual({
            ok: true,
            content: 'l1\nl2\nl3\nl4\nl5\n... (truncated after 5 lines)',
            actionsRun: [],
        });
    });

    it('applies actions in list order', () => {
        const settings = settingsWith({ actions: [ActionName.StripTags, ActionName.CompressWhitespace] });
        const result = pipeline.apply('<p>a</p>   <p>b</p>', settings, { path: 'a.html', extension: '.html' });
        expect(result.ok && result.content).toBe('a b');
    });

    it('truncates after every action has run', () => {
        const settings = settingsWith({ actions: [ActionName.RemoveEmptyLines], maxLines: 2 });
        const result = pipeline.apply('a\n\nb\n\nc', settings, { path: 'a.txt', extension: '.txt' });
        expect(result.ok && result.content).toBe('a\nb\n... (truncated after 2 lines)');
    });

    it('treats none as a no-op', () => {
        const result = pipeline.apply('  x  ', settingsWith({ actions: [ActionName.None] }), { path: 'a', extension: '' });
        expect(result).toEqual({ ok: true, content: '  x  ', actionsRun: ['none'] });
    });

    it('removes scraped metadata before the actions', () => {
        const content = 'Body\n\n---\n\n*Scraped from: u*\n\n*Scraped at: t*\n\n*Source URL: u*\n';
        const result = pipeline.apply(content, settingsWith({ removeScrapedMetadata: true }), {
            path: 'page.md',
            extension: '.md',
        });
        expect(result.ok && result.content).toBe('Body');
    });

    it('dispatches custom processors with their arguments', () => {
        const settings = settingsWith({
            actions: [ActionName.Custom],
            customProcessor: 'truncate',
            processorArgs: { max_chars: 10 },
        });
        expect(pipeline.apply('abcdefghijklmnop', settings, { path: 'a.txt', extension: '.txt' })).toEqual({
            ok: true,
            content: 'abcdefghij\n... (truncated at 10 chars)',
            actionsRun: ['custom:truncate'],
        });
    });

    it('reports an unregistered processor with its rule and file', () => {
        const settings = settingsWith({ actions: [ActionName.Custom], customProcessor: 'nope' });
        const result = pipeline.apply('x', settings, { path: 'a.txt', extension: '.txt', match });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(UnknownProcessorError);
        expect(result.error.message).toBe(
            "Unknown custom processor 'nope'. Available processors: extract_functions, redact_secrets, truncate " +
                "(group 'g', rule 'r', file 'a.txt')"
        );
    });

    it('reports a custom action without a processor name', () => {
        const settings = settingsWith({ actions: [ActionName.Custom] });
        const result = pipeline.apply('x', settings, { path: 'a.txt', extension: '.txt' });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toMatch(/^No custom processor configured\./);
    });

    it('wraps a failing processor and keeps the cause', () => {
        const registry = new ProcessorRegistry();
        const cause = new Error('kaput');
        registry.register('boom', () => {
            throw cause;
        });
        const settings = settingsWith({ actions: [ActionName.Custom], customProcessor: 'boom' });
        const result = new ActionPipeline(registry).apply('x', settings, { path: 'a.txt', extension: '.txt' });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(ProcessorExecutionError);
        expect(result.error.message).toBe("Custom processor 'boom' failed: kaput (file 'a.txt')");
        expect(result.error instanceof ProcessorExecutionError && result.error.cause).toBe(cause);
    });

    it('reports invalid processor arguments as an execution failure', () => {
        const settings = settingsWith({
            actions: [ActionName.Custom],
            customProcessor: 'truncate',
            processorArgs: { max_chars: -1 },
        });
        const result = pipeline.apply('x', settings, { path: 'a.txt', extension: '.txt' });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(ProcessorExecutionError);
    });

    it('records actions completed before a failure', () => {
        const settings = settingsWith({
            actions: [ActionName.CompressWhitespace, ActionName.Custom],
            customProcessor: 'nope',
        });
        const result = new ActionPipeline(createBuiltinRegistry()).apply('a  b', settings, { path: 'a', extension: '' });
        expect(result.actionsRun).toEqual(['compress_whitespace']);
    });
});
