import { Logger } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ProviderFaultError } from '../provider/provider-fault.error';
import { ProviderFaultFilter } from './provider-fault.filter';

describe('ProviderFaultFilter', () => {
  it('answers provider faults with 502 Bad Gateway', () => {
    const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const json = jest.fn();
    const response = { status: jest.fn(() => ({ json })) };
    const host = new ExecutionContextHost([{}, response]);

    new ProviderFaultFilter().catch(
      new ProviderFaultError('Got 503 from http://provider.test/v3/stations/NYP', 'http://provider.test/v3/stations/NYP', 503),
      host,
    );

    expect(response.status).toHaveBeenCalledWith(502);
    expect(json).toHaveBeenCalledWith({
      statusCode: 502,
      error: 'Bad Gateway',
      message: 'Got 503 from http://provider.test/v3/stations/NYP',
    });
    errorSpy.mockRestore();
  });
});
