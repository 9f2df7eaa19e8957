import { YieldTable, bondClassKey, classKeyOf } from '../src/core/yieldTable';
import { BondFactory } from '../src/collaborators/bondFactory';
import { TokenBook } from '../src/capital/tokenBook';
import { ONE_YIELD } from '../src/config/constants';
import { UnacceptableParams } from '../src/core/errors';

function setup(freeze: boolean) {
    const bonds = new BondFactory(new TokenBook());
    const bond = bonds.createBond('COLL', [200, 800], 5000, 200);
    const table = new YieldTable(bonds, freeze);
    table.updateDefinedYield(bondClassKey(bond), [ONE_YIELD, 0n]);
    return { bonds, bond, table };
}

describe('YieldTable', () => {
    test('class key combines collateral and ratios', () => {
        const { bond } = setup(true);
        expect(bondClassKey(bond)).toBe('COLL:200-800');
        expect(classKeyOf('COLL', [200, 800])).toBe('COLL:200-800');
    });

    test('looks up yields by seniority', () => {
        const { bond, table } = setup(true);
        expect(table.trancheYield(bond.tranches[0].id)).toBe(ONE_YIELD);
        expect(table.trancheYield(bond.tranches[1].id)).toBe(0n);
        expect(table.trancheYield('UNKNOWN')).toBe(0n);
        expect(table.trancheYield('COLL', 'COLL')).toBe(ONE_YIELD);
    });

    test('every bond of a class shares the row', () => {
        const { bonds, table } = setup(true);
        const later = bonds.createBond('COLL', [200, 800], 6200, 1400);
        expect(table.trancheYield(later.tranches[0].id)).toBe(ONE_YIELD);
    });

    test('a class used to mint is frozen', () => {
        const { bond, table } = setup(true);
        table.markUsed(bond.tranches[0].id);
        expect(table.isFrozen('COLL:200-800')).toBe(true);
        expect(() => table.updateDefinedYield('COLL:200-800', [500_000n, 0n])).toThrow(UnacceptableParams);
    });

    test('freezing can be switched off', () => {
        const { bond, table } = setup(false);
        table.markUsed(bond.tranches[0].id);
        table.updateDefinedYield('COLL:200-800', [500_000n, 0n]);
        expect(table.trancheYield(bond.tranches[0].id)).toBe(500_000n);
    });

    test('negative yields are rejected', () => {
        const { table } = setup(true);
        expect(() => table.updateDefinedYield('OTHER:1000', [-1n])).toThrow(UnacceptableParams);
    });
});
