import type { GenerationResult } from '../../types.js';

/** The generation-result slot read by whatever displays the quiz. */
export class GenerationResultHolder {
  private current: GenerationResult | null = null;

  reset(): void {
    this.current = null;
  }

  set(result: GenerationResult): void {
    this.current = result;
  }

  get(): GenerationResult | null {
    return this.current;
  }
}

export const generationResults = new GenerationResultHolder();
