import { expect } from 'chai';
import { getAddress, parseEther } from 'viem';

import { ConfigError, loadConfig } from '../lib/config.js';

const VALID_ENV: Record<string, string> = {
    TOKEN_NAME: 'Local Meme',
    TOKEN_SYMBOL: 'LMEME',
    TOTAL_SUPPLY: '1000000',
    DEV_WALLET: '0x00000000000000000000000000000000000000d1',
    MARKETING_WALLET: '0x00000000000000000000000000000000000000d2',
    LIQUIDITY_WALLET: '0x00000000000000000000000000000000000000d3',
    DEPLOYER_ADDRESS: '0x00000000000000000000000000000000000000a1',
    LIQUIDITY_TOKENS: '500000',
    LIQUIDITY_NATIVE: '2.5',
};

function issuesFor(env: Record<string, string | undefined>): readonly string[] {
    try {
        loadConfig(env);
    } catch (err) {
        if (err instanceof ConfigError) return err.issues;
        throw err;
    }
    throw new Error('Expected a ConfigError');
}

describe('loadConfig', () => {
    it('parses a valid environment', () => {
        const config = loadConfig(VALID_ENV);
        expect(config.token).to.deep.equal({
            name: 'Local Meme',
            symbol: 'LMEME',
            totalSupply: 1_000_000n,
            devWallet: getAddress('0x00000000000000000000000000000000000000d1'),
            marketingWallet: getAddress('0x00000000000000000000000000000000000000d2'),
            liquidityWallet: getAddress('0x00000000000000000000000000000000000000d3'),
        });
        expect(config.deployer).to.equal(getAddress('0x00000000000000000000000000000000000000a1'));
        expect(config.liquidityTokens).to.equal(500_000n);
        expect(config.liquidityNative).to.equal(parseEther('2.5'));
        expect(config.simulationRounds).to.equal(10);
    });

    it('reads SIMULATION_ROUNDS when set', () => {
        expect(loadConfig({ ...VALID_ENV, SIMULATION_ROUNDS: '25' }).simulationRounds).to.equal(25);
    });

    it('rejects a supply outside the allowed range', () => {
        expect(issuesFor({ ...VALID_ENV, TOTAL_SUPPLY: '0' })).to.deep.equal([
            'TOTAL_SUPPLY: must be between 1 and 1000000000000000',
        ]);
        expect(issuesFor({ ...VALID_ENV, TOTAL_SUPPLY: '1000000000000001' })).to.deep.equal([
            'TOTAL_SUPPLY: must be between 1 and 1000000000000000',
        ]);
    });

    it('rejects fractional token amounts', () => {
        expect(issuesFor({ ...VALID_ENV, LIQUIDITY_TOKENS: '1.5' })).to.deep.equal([
            'LIQUIDITY_TOKENS: must be a whole number of tokens',
        ]);
    });

    it('requires at least 0.5 native for liquidity', () => {
        expect(issuesFor({ ...VALID_ENV, LIQUIDITY_NATIVE: '0.4' })).to.deep.equal([
            'LIQUIDITY_NATIVE: must be at least 0.5',
        ]);
        expect(loadConfig({ ...VALID_ENV, LIQUIDITY_NATIVE: '0.5' }).liquidityNative).to.equal(parseEther('0.5'));
    });

    it('rejects malformed addresses', () => {
        expect(issuesFor({ ...VALID_ENV, DEV_WALLET: 'not-an-address' })).to.deep.equal([
            'DEV_WALLET: must be a 20-byte hex address',
        ]);
    });

    it('reports every missing variable at once', () => {
        const { TOKEN_NAME: _name, DEPLOYER_ADDRESS: _deployer, ...rest } = VALID_ENV;
        const issues = issuesFor(rest);
        expect(issues).to.have.length(2);
        expect(issues[0]).to.match(/^TOKEN_NAME: /);
        expect(issues[1]).to.match(/^DEPLOYER_ADDRESS: /);
    });

    it('rejects a liquidity allocation above the supply', () => {
        expect(issuesFor({ ...VALID_ENV, LIQUIDITY_TOKENS: '1000001' })).to.deep.equal([
            'LIQUIDITY_TOKENS: cannot exceed TOTAL_SUPPLY',
        ]);
    });
});

describe('ConfigError', () => {
    it('lists the issues in its message', () => {
        const err = new ConfigError(['A: first', 'B: second']);
        expect(err.message).to.equal('Invalid configuration:\n  A: first\n  B: second');
        expect(err.name).to.equal('ConfigError');
    });
});
