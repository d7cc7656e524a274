/**
 * Chain Tracker
 *
 * Detects a fixed sequence of transitions happening back to back. It rides on
 * ordinary handler dispatch: a group of handlers installed on the chain's
 * transitions (plus one on `ANY => ANY`) drive a small counter machine.
 *
 * Per dispatch pass, ordered by priority:
 *   100  arm   - first transition of the chain: start tracking, zero counters
 *   100  step  - each chain transition: count one match (once per pass)
 *   150  observe - every transition: count it, break the chain if unmatched
 *   200  complete - last transition: report success when every step matched
 *
 * Counters belong to one tracker, so chains never interfere, including
 * across re-entrant transitions.
 */

import { composeDisposables } from './disposable.js';
import { ANY } from './identity.js';
import type { RouteChain, Route } from './route.js';
import { passesGuard } from './routing-table.js';
import { Transition } from './transition.js';
import {
  DEFAULT_PRIORITY,
  type Disposable,
  type Handler,
  type HandlerOptions,
  type TransitionContext,
} from './types.js';

export const CHAIN_STEP_PRIORITY = DEFAULT_PRIORITY;
export const CHAIN_OBSERVE_PRIORITY = 150;
export const CHAIN_COMPLETE_PRIORITY = 200;

/**
 * Which end of the chain the tracker reports
 */
export type ChainOutcome = 'success' | 'failure';

/**
 * What the tracker needs from a machine: transition-keyed handlers
 */
export interface ChainRegistrar<S, E = never> {
  addHandler(transition: Transition<S>, handler: Handler<S, E>, options?: HandlerOptions): Disposable;
}

export interface ChainProgress {
  readonly armed: boolean;
  readonly matched: number;
  readonly observed: number;
}

export class ChainTracker<S, E = never> {
  private armed = false;
  private matched = 0;
  private observed = 0;
  private stepTaken = false;

  constructor(
    private readonly chain: RouteChain<S, E>,
    private readonly outcome: ChainOutcome,
    private readonly handler: Handler<S, E>
  ) {}

  get progress(): ChainProgress {
    return { armed: this.armed, matched: this.matched, observed: this.observed };
  }

  /**
   * Register the tracking handlers
   * @returns a handle removing all of them
   */
  install(registrar: ChainRegistrar<S, E>): Disposable {
    const { first, last, routes } = this.chain;

    const disposables = [
      registrar.addHandler(first.transition, (context) => this.arm(first, context), {
        priority: CHAIN_STEP_PRIORITY,
      }),
      ...routes.map((step) =>
        registrar.addHandler(step.transition, (context) => this.step(step, context), {
          priority: CHAIN_STEP_PRIORITY,
        })
      ),
      registrar.addHandler(new Transition<S>(ANY, ANY), (context) => this.observe(context), {
        priority: CHAIN_OBSERVE_PRIORITY,
      }),
      registrar.addHandler(last.transition, (context) => this.complete(last, context), {
        priority: CHAIN_COMPLETE_PRIORITY,
      }),
    ];

    return composeDisposables(...disposables);
  }

  private arm(first: Route<S, E>, context: TransitionContext<S, E>): void {
    if (!this.armed && passesGuard(first.guard, context)) {
      this.armed = true;
      this.matched = 0;
      this.observed = 0;
    }
  }

  private step(step: Route<S, E>, context: TransitionContext<S, E>): void {
    if (this.stepTaken || !this.armed) {
      return;
    }
    if (passesGuard(step.guard, context)) {
      this.matched++;
      this.stepTaken = true;
    }
  }

  private observe(context: TransitionContext<S, E>): void {
    this.stepTaken = false;
    if (!this.armed) {
      return;
    }

    this.observed++;
    if (this.matched < this.observed) {
      this.armed = false;
      if (this.outcome === 'failure') {
        this.handler(context);
      }
    }
  }

  private complete(last: Route<S, E>, context: TransitionContext<S, E>): void {
    if (!this.armed || !passesGuard(last.guard, context)) {
      return;
    }
    const length = this.chain.length;
    if (this.matched === length && this.observed === length) {
      this.armed = false;
      if (this.outcome === 'success') {
        this.handler(context);
      }
    }
  }
}
