import { loadConfig } from '../src/config';
import { UnacceptableParams } from '../src/core/errors';
import { createSupabaseClient } from '../src/db/supabase';

describe('loadConfig', () => {
    test('defaults without environment overrides', () => {
        const config = loadConfig({});
        expect(config.underlying).toBe('UNDERLYING');
        expect(config.trancheRatios).toEqual([200, 800]);
        expect(config.definedYields).toEqual([1_000_000n, 0n]);
        expect(config.minMaturitySec).toBe(1200);
        expect(config.maxMaturitySec).toBe(6000);
        expect(config.maxUnderlyingPerc).toBe(100_000_000n);
        expect(config.freezeYieldOnFirstUse).toBe(true);
        expect(config.supabaseUrl).toBeNull();
    });

    test('parses amounts, decimals and lists', () => {
        const config = loadConfig({
            UNDERLYING_ASSET: 'AMPL',
            TRANCHE_RATIOS: '250, 250, 500',
            DEFINED_YIELDS: '1,0.5,0',
            RESERVED_UNDERLYING_PERC: '0.1',
            MIN_DEPLOYMENT_AMT: '100',
            FREEZE_YIELD_ON_FIRST_USE: 'false',
            SUPABASE_KEY: 'test-key',
        });
        expect(config.underlying).toBe('AMPL');
        expect(config.trancheRatios).toEqual([250, 250, 500]);
        expect(config.definedYields).toEqual([1_000_000n, 500_000n, 0n]);
        expect(config.reservedUnderlyingPerc).toBe(10_000_000n);
        expect(config.minDeploymentAmt).toBe(100n);
        expect(config.freezeYieldOnFirstUse).toBe(false);
        expect(config.supabaseKey).toBe('test-key');
    });

    test('rejects inconsistent settings', () => {
        expect(() => loadConfig({ DEFINED_YIELDS: '1' })).toThrow(UnacceptableParams);
        expect(() => loadConfig({ MAX_MATURITY_SEC: '1000' })).toThrow(UnacceptableParams);
        expect(() => loadConfig({ MIN_DEPLOYMENT_AMT: '1.5' })).toThrow(UnacceptableParams);
        expect(() => loadConfig({ KEEPER_INTERVAL_MS: 'soon' })).toThrow(UnacceptableParams);
        expect(() => loadConfig({ TRANCHE_RATIOS: '200,x' })).toThrow(UnacceptableParams);
    });
});

describe('createSupabaseClient', () => {
    test('no client without credentials or with a bad URL', () => {
        expect(createSupabaseClient({ supabaseUrl: null, supabaseKey: null })).toBeNull();
        expect(createSupabaseClient({ supabaseUrl: 'not a url', supabaseKey: 'test-key' })).toBeNull();
    });
});
