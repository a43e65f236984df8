import type { PipelineState } from '../types';

/**
 * The single mutable state cell of a coordinator. Transitions go through
 * `compareAndSet`, so a stale caller cannot overwrite a newer state.
 */
export class PipelineStateHolder {
  private state: PipelineState;

  public constructor(initial: PipelineState = 'idle') {
    this.state = initial;
  }

  public get(): PipelineState {
    return this.state;
  }

  public compareAndSet(expected: PipelineState, next: PipelineState): boolean {
    if (this.state !== expected) {
      return false;
    }

    this.state = next;
    return true;
  }
}
