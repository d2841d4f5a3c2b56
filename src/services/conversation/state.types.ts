import type {
  ReservationChanges,
  ReservationDraft,
  ReservationEvent,
} from '@core/interfaces/reservation.types.js';

export type ContextName = 'greeting' | 'new_reservation' | 'confirmation' | 'manage';

export type StepName = 'welcome' | 'ready' | 'collect' | 'confirm' | 'found';

export const STATE_POSITIONS = {
  'greeting.welcome': { context: 'greeting', step: 'welcome' },
  'greeting.ready': { context: 'greeting', step: 'ready' },
  'new_reservation.collect': { context: 'new_reservation', step: 'collect' },
  'confirmation.confirm': { context: 'confirmation', step: 'confirm' },
  'manage.found': { context: 'manage', step: 'found' },
} as const satisfies Record<string, { context: ContextName; step: StepName }>;

export type StateKey = keyof typeof STATE_POSITIONS;

export type Intent =
  | { name: 'proceed' }
  | { name: 'start_new_reservation' }
  | { name: 'lookup_reservation'; phone?: string; guestName?: string }
  | { name: 'set_name'; guestName: string }
  | { name: 'set_party_size'; partySize: number }
  | { name: 'set_date'; date: string }
  | { name: 'set_time'; time: string }
  | { name: 'set_phone'; phone: string }
  | { name: 'set_requests'; requests: string }
  | { name: 'check_availability'; date?: string; time?: string }
  | { name: 'confirm_reservation' }
  | { name: 'modify_reservation'; changes: ReservationChanges }
  | { name: 'cancel_existing_reservation' }
  | { name: 'cancel_flow' };

export type IntentName = Intent['name'];

export type IntentOf<N extends IntentName> = Extract<Intent, { name: N }>;

/** Which intents each position accepts. Anything else is turned away without touching state. */
export const ALLOWED_INTENTS = {
  'greeting.welcome': ['proceed', 'start_new_reservation', 'lookup_reservation'],
  'greeting.ready': ['start_new_reservation', 'lookup_reservation'],
  'new_reservation.collect': [
    'set_name',
    'set_party_size',
    'set_date',
    'set_time',
    'set_phone',
    'set_requests',
    'check_availability',
    'cancel_flow',
  ],
  'confirmation.confirm': ['confirm_reservation', 'cancel_flow'],
  'manage.found': ['modify_reservation', 'cancel_existing_reservation', 'cancel_flow'],
} as const satisfies Record<StateKey, readonly IntentName[]>;

export interface SessionState {
  sessionId: string;
  state: StateKey;
  draft?: ReservationDraft;
  /** Set by a single-match lookup; modify and cancel resolve against it. */
  foundReservationId?: string;
  turn: number;
  updatedAt: string;
}

export interface Transition {
  session: SessionState;
  responseText: string;
  events: ReservationEvent[];
}

export interface TurnResult {
  responseText: string;
  events: ReservationEvent[];
  nextContext: ContextName;
  nextStep: StepName;
}
