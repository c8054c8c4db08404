/**
 * @file Asset Instance Tests
 *
 * Run submission, run id uniqueness, runless reports, staleness and
 * settings defaults through the facade.
 *
 * @module dag/instance
 */

import { describe, it, expect } from 'vitest';
import { SettingsService } from '../../config/settings.js';
import { silentLogger } from '../../log/logger.js';
import { DuplicateRunError, UnknownDependencyError } from '../errors.js';
import type { MaterializationEvent } from '../events/types.js';
import { produced } from '../execution/outputs.js';
import type { ComputeContext, ComputeFn, RunResult, StepOutput } from '../execution/types.js';
import { assetKey_toString } from '../graph/assetKey.js';
import type { AssetDeclaration } from '../graph/types.js';
import { InMemoryIOManager } from '../io/InMemoryIOManager.js';
import { AssetInstance, type AssetInstanceOptions } from './AssetInstance.js';

const train: ComputeFn = (ctx: ComputeContext): StepOutput => ({ model: produced(`trained on ${String(ctx.inputs['data'])}`) });

function declarations(codeVersion: string): AssetDeclaration[] {
    return [
        { kind: 'source', key: 'data' },
        { kind: 'step', id: 'train', outputs: [{ key: 'model', codeVersion }], inputs: [{ name: 'data' }], compute: train },
    ];
}

function options(env: Record<string, string> = {}): AssetInstanceOptions {
    return {
        settings: new SettingsService(env),
        logger: silentLogger,
        ioManager: new InMemoryIOManager([['data', 'rows']]),
    };
}

describe('dag/instance/AssetInstance', (): void => {

    it('should run a selection and record the materialization', async (): Promise<void> => {
        const instance: AssetInstance = AssetInstance.fromDeclarations(declarations('1'), options());
        expect(instance.isStale('model')).toBe(true);

        const result: RunResult = await instance.submitRun({ kind: 'keys', keys: ['model'] }, 'r1');

        expect(result.status).toBe('succeeded');
        expect(result.runId).toBe('r1');
        expect(instance.log.latest_get('model')?.codeVersion).toBe('1');
        expect(instance.isStale('model')).toBe(false);
    });

    it('should accept a precompiled plan', async (): Promise<void> => {
        const instance: AssetInstance = AssetInstance.fromDeclarations(declarations('1'), options());
        const plan = instance.plan({ kind: 'all' });
        expect(plan.order).toEqual(['train']);

        const result: RunResult = await instance.submitRun(plan, 'r1');
        expect(result.status).toBe('succeeded');
    });

    it('should reject a run id that was already submitted', async (): Promise<void> => {
        const instance: AssetInstance = AssetInstance.fromDeclarations(declarations('1'), options());
        await instance.submitRun({ kind: 'all' }, 'r1');

        await expect(instance.submitRun({ kind: 'all' }, 'r1')).rejects.toThrow(DuplicateRunError);
        await expect(instance.submitRun({ kind: 'all' }, 'r1')).rejects.toThrow("Run id 'r1' has already been submitted");
    });

    it('should reject a run id already present in the log', async (): Promise<void> => {
        const instance: AssetInstance = AssetInstance.fromDeclarations(declarations('1'), options());
        instance.materialization_report('data', { runId: 'observed-1' });

        await expect(instance.submitRun({ kind: 'all' }, 'observed-1')).rejects.toThrow(DuplicateRunError);
    });

    it('should not claim the run id of a rejected selection', async (): Promise<void> => {
        const instance: AssetInstance = AssetInstance.fromDeclarations(declarations('1'), options());

        await expect(instance.submitRun({ kind: 'keys', keys: ['ghost'] }, 'r1')).rejects.toThrow(UnknownDependencyError);
        const result: RunResult = await instance.submitRun({ kind: 'keys', keys: ['model'] }, 'r1');
        expect(result.status).toBe('succeeded');
    });

    it('should record externally observed materializations', async (): Promise<void> => {
        const instance: AssetInstance = AssetInstance.fromDeclarations(declarations('1'), options());
        const seen: string[] = [];
        const unsubscribe = instance.subscribe((event: MaterializationEvent): void => {
            seen.push(assetKey_toString(event.key));
        });

        const event: MaterializationEvent = instance.materialization_report('data', { metadata: { rows: 10 } });
        await instance.bus.drain();
        unsubscribe();

        expect(event.stepId).toBeNull();
        expect(event.codeVersion).toBeNull();
        expect(event.runId.startsWith('report-')).toBe(true);
        expect(instance.log.latest_get('data')?.metadata).toEqual({ rows: 10 });
        expect(seen).toEqual(['data']);
        expect(instance.bus.observerCount).toBe(0);
        expect((): unknown => instance.materialization_report('ghost')).toThrow(UnknownDependencyError);
    });

    it('should report staleness after a code version change', async (): Promise<void> => {
        const first: AssetInstance = AssetInstance.fromDeclarations(declarations('1'), options());
        await first.submitRun({ kind: 'all' }, 'r1');

        const second: AssetInstance = AssetInstance.fromDeclarations(declarations('2'), { ...options(), log: first.log });
        expect(second.isStale('model')).toBe(true);
        expect(second.staleness_report().map((entry) => entry.reason)).toEqual(['code-version-changed']);
    });

    it('should take the default retry delay from settings', (): void => {
        const instance: AssetInstance = AssetInstance.fromDeclarations(
            [{ kind: 'step', id: 'flaky', outputs: [{ key: 'out' }], retryPolicy: { maxRetries: 1 }, compute: train }],
            options({ ASSETFLOW_RETRY_DELAY_MS: '250' }),
        );
        expect(instance.graph.steps.get('flaky')?.retryPolicy?.delayMs).toBe(250);
    });

    it('should take the concurrency limit from settings', async (): Promise<void> => {
        let active: number = 0;
        let peak: number = 0;
        const slow = (key: string): ComputeFn => async (): Promise<StepOutput> => {
            active++;
            peak = Math.max(peak, active);
            await new Promise<void>((resolve: () => void): void => {
                setTimeout(resolve, 2);
            });
            active--;
            return { [key]: produced(key) };
        };
        const instance: AssetInstance = AssetInstance.fromDeclarations(
            ['x', 'y', 'z'].map((key: string): AssetDeclaration => ({
                kind: 'step', id: key, outputs: [{ key }], compute: slow(key),
            })),
            options({ ASSETFLOW_MAX_CONCURRENCY: '1' }),
        );

        const result: RunResult = await instance.submitRun({ kind: 'all' }, 'r1');
        expect(result.status).toBe('succeeded');
        expect(peak).toBe(1);
    });
});
