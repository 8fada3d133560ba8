export const CHECKIN_STEPS = ['awaitingPhoto', 'awaitingVoice', 'awaitingNotes', 'classifying', 'done'] as const;

export type CheckInStep = (typeof CHECKIN_STEPS)[number];
