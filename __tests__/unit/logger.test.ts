/**
 * Tests unitarios para core/utils/logger.ts
 */
import log from 'electron-log/node';
import { logger } from '../../core/utils/logger';

describe('logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('debe reutilizar el logger de un mismo scope', () => {
    const engine = logger.child('Motor');
    expect(logger.child('Motor')).toBe(engine);
    expect(engine.child('Cola')).toBe(logger.child('Motor:Cola'));
  });

  it('debe escribir los errores con su stack', () => {
    const spy = jest.spyOn(log, 'error').mockImplementation(() => undefined);
    const error = new Error('fallo de prueba');
    logger.error('Algo falló:', error);
    expect(spy).toHaveBeenCalledWith('Algo falló:', `fallo de prueba\n${error.stack ?? ''}`);
  });

  it('debe registrar inicio y fin de una operación', () => {
    const spy = jest.spyOn(log, 'info').mockImplementation(() => undefined);
    const end = logger.startOperation('Carga');
    end('3 jobs');
    expect(spy).toHaveBeenNthCalledWith(1, '▶ Carga');
    expect(spy.mock.calls[1][0]).toMatch(/^✓ Carga: 3 jobs \(\d+ms\)$/);
  });
});
