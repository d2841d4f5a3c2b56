import { config } from '@config/env.config.js';

import { ValidationError } from '@core/errors/validation.error.js';

import { KeyedMutex, sessionLockKey } from '@utils/locks.js';
import { logger } from '@utils/logger.js';
import { systemClock, toIso, type Clock } from '@utils/time.js';

import { ReservationService } from '../booking/reservation.service.js';
import { ReservationEventBus } from '../events/event-bus.js';

import { DraftManager } from './draft-manager.js';
import { parseIntent } from './intents.js';
import { assertInvariants } from './invariants.js';
import { replies } from './replies.js';
import { ConversationStateMachine } from './state-machine.js';
import { ConversationStateStore } from './state.store.js';
import { STATE_POSITIONS, type SessionState, type Transition, type TurnResult } from './state.types.js';

/**
 * Entry point for the voice platform: one call per recognized intent.
 * Turns for the same session run one at a time; different sessions only
 * contend on the slots they touch.
 */
export class ConversationService {
  private readonly machine: ConversationStateMachine;

  constructor(
    readonly reservations = new ReservationService(),
    readonly store = new ConversationStateStore(),
    readonly events = new ReservationEventBus(),
    private readonly locks = new KeyedMutex(),
    private readonly clock: Clock = systemClock,
    private readonly restaurantName = config.RESTAURANT_NAME,
    /** Cross-checks store and ledger after every turn that changed a reservation. */
    private readonly checkConsistency = config.NODE_ENV !== 'production',
  ) {
    this.machine = new ConversationStateMachine(reservations, new DraftManager(), clock);
  }

  async handleIntent(sessionId: string, intentName: string, args?: unknown): Promise<TurnResult> {
    return this.locks.runExclusive(sessionLockKey(sessionId), async () => {
      const current = this.store.getOrCreate(sessionId, this.clock());
      const transition = await this.step(current, intentName, args);
      if (this.checkConsistency && transition.events.length) {
        this.reservations.assertConsistent();
      }

      const next: SessionState = {
        ...transition.session,
        turn: current.turn + 1,
        updatedAt: toIso(this.clock),
      };
      this.store.save(next);

      const issues = assertInvariants(next, this.reservations.validation);
      if (issues.length) {
        logger.warn('[conversation] invariant warnings', { sessionId, state: next.state, issues });
      }

      logger.info('[conversation] turn', {
        sessionId,
        intent: intentName,
        from: current.state,
        to: next.state,
        turn: next.turn,
      });

      this.events.publish(transition.events);

      const { context, step } = STATE_POSITIONS[next.state];
      return {
        responseText: transition.responseText,
        events: transition.events,
        nextContext: context,
        nextStep: step,
      };
    });
  }

  /** Opening line for a new call; does not create a session. */
  greeting(): string {
    return replies.welcome(this.restaurantName);
  }

  /** Forgets the session and its draft. Confirmed reservations stay. */
  async endSession(sessionId: string): Promise<boolean> {
    const removed = await this.locks.runExclusive(sessionLockKey(sessionId), () =>
      this.store.delete(sessionId),
    );
    if (removed) logger.info('[conversation] session ended', { sessionId });
    return removed;
  }

  private async step(session: SessionState, intentName: string, args: unknown): Promise<Transition> {
    try {
      return await this.machine.handle(session, parseIntent(intentName, args));
    } catch (err) {
      if (err instanceof ValidationError) {
        logger.warn('[conversation] rejected intent', {
          sessionId: session.sessionId,
          intent: intentName,
          fields: err.fields,
        });
        return { session, responseText: replies.invalid(err.message), events: [] };
      }
      throw err;
    }
  }
}
