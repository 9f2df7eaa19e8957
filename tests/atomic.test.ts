import { AtomicExecutor, Snapshottable } from '../src/state/atomic';
import { ReentrantCall, UnacceptableParams } from '../src/core/errors';

class Counter implements Snapshottable<number> {
    value = 0;
    snapshot(): number {
        return this.value;
    }
    restore(state: number): void {
        this.value = state;
    }
}

function setup() {
    const executor = new AtomicExecutor();
    const counter = new Counter();
    executor.register(counter);
    return { executor, counter };
}

describe('AtomicExecutor', () => {
    const engine = {};
    const vault = {};

    test('commits on success', () => {
        const { executor, counter } = setup();
        const result = executor.run(engine, 'bump', () => {
            counter.value = 3;
            return 'done';
        });
        expect(result).toBe('done');
        expect(counter.value).toBe(3);
        expect(executor.depth).toBe(0);
    });

    test('restores every participant when the operation throws', () => {
        const { executor, counter } = setup();
        counter.value = 1;
        expect(() => executor.run(engine, 'bump', () => {
            counter.value = 5;
            throw new UnacceptableParams('boom');
        })).toThrow(UnacceptableParams);
        expect(counter.value).toBe(1);
    });

    test('unexpected errors roll back too', () => {
        const { executor, counter } = setup();
        expect(() => executor.run(engine, 'bump', () => {
            counter.value = 5;
            throw new Error('boom');
        })).toThrow('boom');
        expect(counter.value).toBe(0);
    });

    test('same owner may not re-enter', () => {
        const { executor, counter } = setup();
        expect(() => executor.run(vault, 'deploy', () => {
            counter.value = 2;
            executor.run(vault, 'recover', () => undefined);
        })).toThrow(ReentrantCall);
        expect(counter.value).toBe(0);
        expect(executor.depth).toBe(0);
    });

    test('nested call from another owner joins the outer unit', () => {
        const { executor, counter } = setup();
        expect(() => executor.run(vault, 'deploy', () => {
            executor.run(engine, 'rollover', () => {
                counter.value = 7;
            });
            throw new UnacceptableParams('late failure');
        })).toThrow(UnacceptableParams);
        expect(counter.value).toBe(0);
    });

    test('phaseOf and operationId are visible while running', () => {
        const { executor } = setup();
        let phase = '';
        let innerPhase = '';
        let opId: string | null = null;
        executor.run(vault, 'deploying', () => {
            phase = executor.phaseOf(vault);
            opId = executor.operationId;
            executor.run(engine, 'rollover', () => {
                innerPhase = executor.phaseOf(engine);
            });
        });
        expect(phase).toBe('deploying');
        expect(innerPhase).toBe('rollover');
        expect(opId).toMatch(/^op_[0-9a-f]{8}_\d+$/);
        expect(executor.phaseOf(vault)).toBe('idle');
        expect(executor.operationId).toBeNull();
    });
});
