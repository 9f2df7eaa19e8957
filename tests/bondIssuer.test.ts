import { InMemoryBondIssuer, BondIssuerConfig } from '../src/collaborators/bondIssuer';
import { BondFactory } from '../src/collaborators/bondFactory';
import { TokenBook } from '../src/capital/tokenBook';
import { UnacceptableParams } from '../src/core/errors';

const WINDOW = 1_700_000_400;

const CONFIG: BondIssuerConfig = {
    collateral: 'COLL',
    maxMaturityDuration: 4800,
    minIssueTimeIntervalSec: 1200,
    issueWindowOffsetSec: 0,
    trancheRatios: [200, 800],
};

const newIssuer = (config: BondIssuerConfig = CONFIG) => new InMemoryBondIssuer(new BondFactory(new TokenBook()), config);

describe('InMemoryBondIssuer', () => {
    test('bond matures a fixed duration after its window opens', () => {
        const issuer = newIssuer();
        const bond = issuer.issue(WINDOW + 100);
        expect(bond?.maturity).toBe(WINDOW + 4800);
        expect(bond?.issuedAt).toBe(WINDOW + 100);
        expect(issuer.lastIssueWindow).toBe(WINDOW);
    });

    test('one bond per window', () => {
        const issuer = newIssuer();
        issuer.issue(WINDOW);
        expect(issuer.issue(WINDOW + 1199)).toBeNull();
        expect(issuer.getLastBond(WINDOW + 1199)?.id).toBe('BOND-1');
        expect(issuer.getLastBond(WINDOW + 1200)?.id).toBe('BOND-2');
        expect(issuer.issuedCount).toBe(2);
    });

    test('issues lazily and only trusts its own bonds', () => {
        const issuer = newIssuer();
        expect(issuer.canIssue(0)).toBe(true);
        const bond = issuer.getLastBond(WINDOW);
        expect(bond?.id).toBe('BOND-1');
        expect(issuer.isInstance('BOND-1')).toBe(true);
        expect(issuer.isInstance('BOND-9')).toBe(false);
    });

    test('config changes apply to the next bond', () => {
        const issuer = newIssuer();
        issuer.issue(WINDOW);
        issuer.updateConfig({ maxMaturityDuration: 6000 });
        expect(issuer.issue(WINDOW + 1200)?.maturity).toBe(WINDOW + 1200 + 6000);
    });

    test('invalid cadence is rejected', () => {
        expect(() => newIssuer({ ...CONFIG, issueWindowOffsetSec: 1200 })).toThrow(UnacceptableParams);
        expect(() => newIssuer({ ...CONFIG, minIssueTimeIntervalSec: 0 })).toThrow(UnacceptableParams);
    });

    test('restore rewinds the issue window', () => {
        const issuer = newIssuer();
        const saved = issuer.snapshot();
        issuer.issue(WINDOW);
        issuer.restore(saved);
        expect(issuer.issuedCount).toBe(0);
        expect(issuer.canIssue(WINDOW)).toBe(true);
    });
});
