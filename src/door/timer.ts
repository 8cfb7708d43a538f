/**
 * Door Module - Countdown Timer
 *
 * A single restartable one-shot timer. Arming replaces any pending deadline,
 * so the first arm and a debounce restart are the same call.
 */

export interface CountdownTimer {
  /** Fire onFire at `deadline` (epoch ms), replacing any pending deadline */
  arm(deadline: number, onFire: () => void, now?: number): void;
  cancel(): void;
  /** Pending deadline, or null when not armed */
  readonly armedUntil: number | null;
}

export function createCountdownTimer(): CountdownTimer {
  let handle: ReturnType<typeof setTimeout> | null = null;
  let deadline: number | null = null;

  const cancel = (): void => {
    if (handle !== null) {
      clearTimeout(handle);
    }
    handle = null;
    deadline = null;
  };

  return {
    arm(nextDeadline, onFire, now = Date.now()) {
      cancel();
      deadline = nextDeadline;
      handle = setTimeout(
        () => {
          handle = null;
          deadline = null;
          onFire();
        },
        Math.max(0, nextDeadline - now),
      );
    },
    cancel,
    get armedUntil() {
      return deadline;
    },
  };
}
