import {
    ZERO_HASH,
    computeCommitment,
    encodeAnswers,
    hashAnswer,
    hashAnswers,
    isHash,
    isZeroHash,
    randomSalt,
    sha256,
} from '../src/crypto';

describe('sha256', () => {
    it('hashes the concatenation of its chunks', () => {
        expect(sha256(Buffer.from('abc'))).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
        expect(sha256(Buffer.from('a'), Buffer.from('bc'))).toBe(sha256(Buffer.from('abc')));
        expect(sha256()).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });
});

describe('encodeAnswers', () => {
    it('prefixes the count and every answer length', () => {
        expect(encodeAnswers(['ab', 'c']).toString('hex')).toBe('00000002' + '00000002' + '6162' + '00000001' + '63');
    });

    it('measures lengths in UTF-8 bytes', () => {
        expect(encodeAnswers(['é']).toString('hex')).toBe('00000001' + '00000002' + 'c3a9');
    });

    it('distinguishes answer sets that concatenate to the same text', () => {
        expect(encodeAnswers(['ab', 'c']).equals(encodeAnswers(['a', 'bc']))).toBe(false);
    });
});

describe('computeCommitment', () => {
    const salt = '22'.repeat(32);

    it('is deterministic', () => {
        expect(computeCommitment('alice', 'Alice', ['x'], salt)).toBe(computeCommitment('alice', 'Alice', ['x'], salt));
    });

    it('binds identity, name, answers and salt', () => {
        const base = computeCommitment('alice', 'Alice', ['ab', 'c'], salt);
        expect(computeCommitment('bob', 'Alice', ['ab', 'c'], salt)).not.toBe(base);
        expect(computeCommitment('alice', 'Alicia', ['ab', 'c'], salt)).not.toBe(base);
        expect(computeCommitment('alice', 'Alice', ['a', 'bc'], salt)).not.toBe(base);
        expect(computeCommitment('alice', 'Alice', ['ab', 'c'], '33'.repeat(32))).not.toBe(base);
    });

    it('matches the documented layout', () => {
        const nameHash = sha256(Buffer.from('Alice'));
        const answersHash = sha256(encodeAnswers(['x']));
        const expected = sha256(
            Buffer.from('alice'),
            Buffer.from(nameHash, 'hex'),
            Buffer.from(answersHash, 'hex'),
            Buffer.from(salt, 'hex'),
        );
        expect(computeCommitment('alice', 'Alice', ['x'], salt)).toBe(expected);
    });
});

describe('answer hashing', () => {
    const salt = '11'.repeat(32);

    it('mixes the round salt into each answer', () => {
        expect(hashAnswer(salt, 'A')).toBe(sha256(Buffer.from(salt, 'hex'), Buffer.from('A')));
        expect(hashAnswer(salt, 'A')).not.toBe(hashAnswer('12'.repeat(32), 'A'));
        expect(hashAnswers(salt, ['A', 'B'])).toEqual([hashAnswer(salt, 'A'), hashAnswer(salt, 'B')]);
    });
});

describe('hash helpers', () => {
    it('recognises 32-byte lowercase hex', () => {
        expect(isHash('ab'.repeat(32))).toBe(true);
        expect(isHash('AB'.repeat(32))).toBe(false);
        expect(isHash('ab'.repeat(31))).toBe(false);
        expect(isZeroHash(ZERO_HASH)).toBe(true);
        expect(isHash(randomSalt())).toBe(true);
    });
});
