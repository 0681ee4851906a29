import { Logger } from '../../utils/logger';

describe('Logger', () => {
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        warnSpy.mockRestore();
    });

    it('mutes debug output until debug mode is enabled', () => {
        const logger = new Logger('[test]');

        logger.debug('hidden');
        expect(logSpy).not.toHaveBeenCalled();

        logger.setDebugMode(true);
        logger.debug('shown', 2);

        expect(logger.isDebugEnabled()).toBe(true);
        expect(logSpy).toHaveBeenCalledWith('[test]', 'shown', 2);
    });

    it('always passes warnings through', () => {
        new Logger('[test]').warn('careful');

        expect(warnSpy).toHaveBeenCalledWith('[test]', 'careful');
    });
});
