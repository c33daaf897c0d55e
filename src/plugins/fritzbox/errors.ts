/**
 * The router connection could not be opened. Fatal to the plugin instance.
 */
export class InitFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InitFailure';
  }
}
