/**
 * Power-cycle state machine for a single PDU
 */

import { type Logger, PowerCycleState, type StateTransitionEvent } from '@pdu-cycle/core';
import { createEventEmitter, type EventEmitter } from './utils/events.js';

/**
 * Valid state transitions.
 * POWERING_OFF loops back to VALIDATING so every outlet is validated right
 * before it is switched off. FAILED is reachable from every non-terminal state.
 */
const VALID_TRANSITIONS: Record<PowerCycleState, PowerCycleState[]> = {
  [PowerCycleState.VALIDATING]: [PowerCycleState.POWERING_OFF, PowerCycleState.FAILED],
  [PowerCycleState.POWERING_OFF]: [
    PowerCycleState.VALIDATING,
    PowerCycleState.VERIFYING_OFFLINE,
    PowerCycleState.FAILED
  ],
  [PowerCycleState.VERIFYING_OFFLINE]: [PowerCycleState.POWERING_ON, PowerCycleState.FAILED],
  [PowerCycleState.POWERING_ON]: [PowerCycleState.VERIFYING_ONLINE, PowerCycleState.FAILED],
  [PowerCycleState.VERIFYING_ONLINE]: [PowerCycleState.DONE, PowerCycleState.FAILED],
  [PowerCycleState.DONE]: [],
  [PowerCycleState.FAILED]: []
};

export type StateMachineEvent = 'transition' | 'done' | 'failed';

/**
 * Tracks the phase of one PDU's power cycle and records every transition
 */
export class PowerCycleStateMachine {
  private current: PowerCycleState = PowerCycleState.VALIDATING;
  private history: StateTransitionEvent[] = [];
  private events: EventEmitter<StateMachineEvent, StateTransitionEvent>;

  constructor(
    readonly pduHost: string,
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.events = createEventEmitter<StateMachineEvent, StateTransitionEvent>(logger);
  }

  get state(): PowerCycleState {
    return this.current;
  }

  canTransition(to: PowerCycleState): boolean {
    return VALID_TRANSITIONS[this.current].includes(to);
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.current].length === 0;
  }

  /**
   * Move to a new state; throws on a transition the machine does not allow
   */
  transition(to: PowerCycleState, reason?: string): void {
    const from = this.current;
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition for ${this.pduHost}: ${from} -> ${to}`);
    }

    this.current = to;
    const event: StateTransitionEvent = {
      pduHost: this.pduHost,
      from,
      to,
      reason,
      timestamp: this.now().toISOString()
    };
    this.history.push(event);
    this.logger?.debug({ from, to, reason }, `state ${from} -> ${to}`);

    this.events.emit('transition', event);
    if (to === PowerCycleState.DONE) this.events.emit('done', event);
    if (to === PowerCycleState.FAILED) this.events.emit('failed', event);
  }

  /**
   * Move to FAILED unless the machine already finished
   */
  fail(reason: string): void {
    if (!this.isTerminal()) {
      this.transition(PowerCycleState.FAILED, reason);
    }
  }

  getHistory(): StateTransitionEvent[] {
    return [...this.history];
  }

  on(event: StateMachineEvent, handler: (data: StateTransitionEvent) => void): void {
    this.events.on(event, handler);
  }

  off(event: StateMachineEvent, handler: (data: StateTransitionEvent) => void): void {
    this.events.off(event, handler);
  }
}
