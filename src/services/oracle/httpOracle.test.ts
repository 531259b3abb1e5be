import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MergedTable } from '../../types';
import { createHttpOracle } from './httpOracle';

const { post } = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock('axios', () => ({ default: { post } }));

const table: MergedTable = {
    columns: ['site', 'source_file'],
    rows: [['A', 'f.csv']],
    sourceFiles: ['f.csv']
};

describe('createHttpOracle', () => {
    const oracle = createHttpOracle({ url: 'http://oracle.local/predict', timeoutMs: 5000 });

    beforeEach(() => {
        post.mockReset();
    });

    it('posts column-keyed rows and returns a bare array reply', async () => {
        post.mockResolvedValue({ data: [{ Site: 'A' }] });

        await expect(oracle.predict(table)).resolves.toEqual([{ Site: 'A' }]);
        expect(post).toHaveBeenCalledWith(
            'http://oracle.local/predict',
            { columns: ['site', 'source_file'], rows: [{ site: 'A', source_file: 'f.csv' }] },
            { timeout: 5000, headers: { 'Content-Type': 'application/json' } }
        );
    });

    it('unwraps a predictions envelope', async () => {
        post.mockResolvedValue({ data: { predictions: [] } });
        await expect(oracle.predict(table)).resolves.toEqual([]);
    });

    it('rejects other shapes', async () => {
        post.mockResolvedValue({ data: { status: 'ok' } });
        await expect(oracle.predict(table)).rejects.toThrow('unexpected response shape from http://oracle.local/predict');
    });
});
