import type { CheckInStep } from '../entities/CheckInStep';

/**
 * Presentation-side feedback (haptics, sounds). Calls are fire-and-forget.
 */
export interface ICheckInFeedback {
  stepChanged(step: CheckInStep): void;
  success(): void;
  failure(): void;
}

export const noopFeedback: ICheckInFeedback = {
  stepChanged: () => {},
  success: () => {},
  failure: () => {},
};
