import { createHash } from 'crypto';

/** Produces the opaque token the search endpoint expects on every request */
export type SessionTokenGenerator = () => string;

/**
 * Fresh 8-hex-char token per call; nothing is cached between calls
 */
export function createSessionTokenGenerator(length: number = 8): SessionTokenGenerator {
    return () => createHash('md5')
        .update(Date.now().toString() + Math.random().toString())
        .digest('hex')
        .substring(0, length);
}
