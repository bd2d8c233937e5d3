export type DisplayNamePolicy = 'strict' | 'length';

export const MAX_DISPLAY_NAME_BYTES = 32;

const STRICT_CHARSET = /^[A-Za-z0-9 _.-]+$/;

/**
 * Display names are 1-32 UTF-8 bytes. The strict policy also limits them to
 * alphanumerics, space, underscore, period and hyphen.
 */
export function isValidDisplayName(name: string, policy: DisplayNamePolicy): boolean {
    const length = Buffer.byteLength(name, 'utf8');
    if (length < 1 || length > MAX_DISPLAY_NAME_BYTES) return false;
    if (policy === 'strict') return STRICT_CHARSET.test(name);
    return true;
}
