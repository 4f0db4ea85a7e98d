/**
 * State of one sign-in attempt
 */

import { generatePkce } from './pkce.ts';
import { generateState } from './state.ts';
import type { PkceParams, SignInStatus, TerminalSignInStatus } from './types.ts';

const TRANSITIONS: Record<SignInStatus, readonly SignInStatus[]> = {
  pending: ['awaiting_redirect', 'failed', 'cancelled', 'timed_out'],
  awaiting_redirect: ['exchanging', 'failed', 'cancelled', 'timed_out'],
  exchanging: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
  timed_out: [],
};

export function isTerminalStatus(status: SignInStatus): status is TerminalSignInStatus {
  return TRANSITIONS[status].length === 0;
}

/**
 * SignInSession owns the secrets of a single attempt and tracks its status
 *
 * Sessions are never reused: once terminal, every further transition throws.
 */
export class SignInSession {
  readonly pkce: PkceParams;
  readonly state: string;
  readonly createdAt: number;
  /** Aborted when the attempt is cancelled, from outside or via cancel() */
  readonly abortController = new AbortController();
  private currentStatus: SignInStatus = 'pending';
  private boundPort: number | undefined;
  private readonly onStatusChange: ((status: SignInStatus) => void) | undefined;

  constructor(onStatusChange?: (status: SignInStatus) => void) {
    this.pkce = generatePkce();
    this.state = generateState();
    this.createdAt = Date.now();
    this.onStatusChange = onStatusChange;
  }

  get status(): SignInStatus {
    return this.currentStatus;
  }

  get port(): number | undefined {
    return this.boundPort;
  }

  recordPort(port: number): void {
    this.boundPort = port;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.currentStatus);
  }

  /**
   * Compare a redirect's state with this attempt's, exactly
   */
  matchesState(state: string | undefined): boolean {
    return state === this.state;
  }

  transition(next: SignInStatus): void {
    if (!TRANSITIONS[this.currentStatus].includes(next)) {
      throw new Error(`Invalid sign-in transition: ${this.currentStatus} -> ${next}`);
    }
    this.currentStatus = next;
    this.onStatusChange?.(next);
  }
}
