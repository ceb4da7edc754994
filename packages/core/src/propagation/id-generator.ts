import { randomBytes } from 'node:crypto';

export interface IdGenerator {
    /** 16 random bytes as 32 lowercase hex chars */
    traceId(): string;
    /** 8 random bytes as 16 lowercase hex chars */
    spanId(): string;
}

export class RandomIdGenerator implements IdGenerator {
    traceId(): string {
        return randomBytes(16).toString('hex');
    }

    spanId(): string {
        return randomBytes(8).toString('hex');
    }
}
