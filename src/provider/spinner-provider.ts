import ora from 'ora';
import type { ConjugationPayload, ConjugationProvider } from './types';

/**
 * Shows a terminal spinner while the wrapped provider works.
 */
export class SpinnerProvider implements ConjugationProvider {
  readonly name: string;
  private readonly inner: ConjugationProvider;

  constructor(inner: ConjugationProvider) {
    this.inner = inner;
    this.name = inner.name;
  }

  async conjugate(verb: string): Promise<ConjugationPayload> {
    const spinner = ora({ text: `Conjugating '${verb}'...`, stream: process.stderr }).start();
    try {
      const payload = await this.inner.conjugate(verb);
      spinner.stop();
      return payload;
    } catch (error) {
      spinner.fail(`Could not conjugate '${verb}'`);
      throw error;
    }
  }
}
