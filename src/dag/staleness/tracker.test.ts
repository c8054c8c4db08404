/**
 * @file Staleness Tracker Tests
 *
 * @module dag/staleness
 */

import { describe, it, expect } from 'vitest';
import { MaterializationLog } from '../events/MaterializationLog.js';
import type { ComputeFn, StepOutput } from '../execution/types.js';
import { produced } from '../execution/outputs.js';
import { graph_resolve } from '../graph/resolver.js';
import type { AssetDeclaration, AssetGraph } from '../graph/types.js';
import { UnknownDependencyError } from '../errors.js';
import { StalenessTracker } from './tracker.js';

const compute: ComputeFn = (): StepOutput => ({ model: produced('weights') });

function declarations(codeVersion: string): AssetDeclaration[] {
    return [
        { kind: 'source', key: 'data' },
        { kind: 'step', id: 'train', outputs: [{ key: 'model', codeVersion }], inputs: [{ name: 'data' }], compute },
        { kind: 'step', id: 'score', outputs: [{ key: 'scores' }], inputs: [{ name: 'model' }], compute },
    ];
}

function model_record(log: MaterializationLog, codeVersion: string | null): void {
    log.event_append({
        key: { path: ['model'] },
        runId: 'run-1',
        stepId: 'train',
        timestamp: '2026-01-01T00:00:00.000Z',
        codeVersion,
        metadata: {},
    });
}

describe('dag/staleness/tracker', (): void => {

    it('should treat a key that never materialized as stale', (): void => {
        const tracker = new StalenessTracker(graph_resolve(declarations('1')), new MaterializationLog());
        expect(tracker.isStale('model')).toBe(true);
        expect(tracker.staleness_check('model').reason).toBe('never-materialized');
    });

    it('should never report a source as stale', (): void => {
        const tracker = new StalenessTracker(graph_resolve(declarations('1')), new MaterializationLog());
        expect(tracker.isStale('data')).toBe(false);
    });

    it('should detect a code version change without a new run', (): void => {
        const log = new MaterializationLog();
        model_record(log, '1');

        const before: AssetGraph = graph_resolve(declarations('1'));
        expect(new StalenessTracker(before, log).isStale('model')).toBe(false);

        const after: AssetGraph = graph_resolve(declarations('2'));
        const tracker = new StalenessTracker(after, log);
        expect(tracker.isStale('model')).toBe(true);
        expect(tracker.staleness_check('model')).toEqual({
            key: 'model',
            stale: true,
            reason: 'code-version-changed',
            declaredCodeVersion: '2',
            recordedCodeVersion: '1',
        });
    });

    it('should compare unversioned slots as null versions', (): void => {
        const log = new MaterializationLog();
        log.event_append({
            key: { path: ['scores'] },
            runId: 'run-1',
            stepId: 'score',
            timestamp: '2026-01-01T00:00:00.000Z',
            codeVersion: null,
            metadata: {},
        });
        const tracker = new StalenessTracker(graph_resolve(declarations('1')), log);
        expect(tracker.isStale('scores')).toBe(false);
    });

    it('should report every computed key in topological order', (): void => {
        const log = new MaterializationLog();
        model_record(log, '1');
        const tracker = new StalenessTracker(graph_resolve(declarations('1')), log);

        expect(tracker.staleness_report()).toEqual([
            { key: 'model', stale: false, reason: null, declaredCodeVersion: '1', recordedCodeVersion: '1' },
            { key: 'scores', stale: true, reason: 'never-materialized', declaredCodeVersion: null, recordedCodeVersion: null },
        ]);
    });

    it('should reject unknown keys', (): void => {
        const tracker = new StalenessTracker(graph_resolve(declarations('1')), new MaterializationLog());
        expect((): unknown => tracker.isStale('ghost')).toThrow(UnknownDependencyError);
    });
});
