import { expect } from 'chai';

import { SafeMath, U256_MAX } from '../src/index.js';
import { expectRevert } from './fixtures.js';

describe('SafeMath', () => {
    it('adds and subtracts within range', () => {
        expect(SafeMath.add(2n, 3n)).to.equal(5n);
        expect(SafeMath.sub(U256_MAX, U256_MAX)).to.equal(0n);
    });

    it('reverts on overflow and underflow', () => {
        expectRevert(() => SafeMath.add(U256_MAX, 1n), 'arithmetic', 'SafeMath: addition overflow');
        expectRevert(() => SafeMath.sub(1n, 2n), 'arithmetic', 'SafeMath: subtraction underflow');
        expectRevert(() => SafeMath.mul(U256_MAX, 2n), 'arithmetic', 'SafeMath: multiplication overflow');
    });

    it('floors division and rejects a zero divisor', () => {
        expect(SafeMath.div(7n, 2n)).to.equal(3n);
        expectRevert(() => SafeMath.div(1n, 0n), 'arithmetic', 'SafeMath: division by zero');
    });

    it('takes floor square roots', () => {
        expect(SafeMath.sqrt(0n)).to.equal(0n);
        expect(SafeMath.sqrt(3n)).to.equal(1n);
        expect(SafeMath.sqrt(4n)).to.equal(2n);
        expect(SafeMath.sqrt(99n)).to.equal(9n);
        expect(SafeMath.sqrt(10n ** 36n)).to.equal(10n ** 18n);
    });

    it('picks min and max', () => {
        expect(SafeMath.min(4n, 9n)).to.equal(4n);
        expect(SafeMath.max(4n, 9n)).to.equal(9n);
    });
});
