import { describe, it, expect, vi, beforeEach } from 'vitest';
import { zone, errorMessage } from '../../../src/logging/zone';
import { baseLogger } from '../../../src/logging/logger';

describe('logging/zone', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
    });

    it('logs string messages with the zone as meta', () => {
        const mock = vi.spyOn(baseLogger, 'log').mockImplementation(() => baseLogger);

        zone('wud.coordinator').info('hello world');

        expect(mock).toHaveBeenCalledWith('info', 'hello world', { zone: 'wud.coordinator' });
    });

    it('attaches data when provided', () => {
        const mock = vi.spyOn(baseLogger, 'log').mockImplementation(() => baseLogger);
        const data = { containers: 3 };

        zone('wud.coordinator').debug({ message: 'refreshed', data });

        expect(mock).toHaveBeenCalledWith('debug', 'refreshed', { zone: 'wud.coordinator', data });
    });

    it('does not pass a data key when the payload has none', () => {
        const mock = vi.spyOn(baseLogger, 'log').mockImplementation(() => baseLogger);

        zone('z').warn({ message: 'only a message' });

        expect(mock).toHaveBeenCalledWith('warn', 'only a message', { zone: 'z' });
    });

    it('replaces private data with "<private>"', () => {
        const mock = vi.spyOn(baseLogger, 'log').mockImplementation(() => baseLogger);

        zone('setup').error({ message: 'credentials', data: { password: 'test-secret' }, private: true });

        expect(mock).toHaveBeenCalledWith('error', 'credentials', { zone: 'setup', data: '<private>' });
    });

    it('renders thrown values as messages', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage(42)).toBe('42');
    });
});
