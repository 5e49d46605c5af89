/** Transport, status or payload failure while talking to the train-data provider. */
export class ProviderFaultError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProviderFaultError';
  }
}
