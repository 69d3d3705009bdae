/**
 * Polled cancellation flag. The owner keeps the source and hands the token
 * to workers; workers only read it at their checkpoints.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
}

export class CancellationSource {
  private requested = false;

  readonly token: CancellationToken;

  constructor() {
    const source = this;
    this.token = {
      get isCancellationRequested(): boolean {
        return source.requested;
      }
    };
  }

  cancel(): void {
    this.requested = true;
  }

  reset(): void {
    this.requested = false;
  }

  get isCancellationRequested(): boolean {
    return this.requested;
  }
}

export const CancellationToken = {
  none: { isCancellationRequested: false } as const satisfies CancellationToken,

  /** Adapts an AbortSignal (or anything with `aborted`) to a token. */
  fromSignal(signal: { readonly aborted: boolean }): CancellationToken {
    return {
      get isCancellationRequested(): boolean {
        return signal.aborted;
      }
    };
  }
};
