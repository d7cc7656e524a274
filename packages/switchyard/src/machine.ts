/**
 * Switchyard Machine
 *
 * Event-driven routing and dispatch engine:
 * - Routes keyed by event (or the `ANY` event) and by transition
 * - Guards and free-form route mappings
 * - Priority-ordered, synchronous handler dispatch
 * - Revocation handles for every registration
 */

import { defaultEquality, type Equality } from './equality.js';
import { HandlerRegistry, insertHandler, removeHandler } from './handler-registry.js';
import { ANY, identityEquality, matches, toIdentity, type Identity } from './identity.js';
import { KeyedMap } from './keyed-map.js';
import { toRoute, type Route } from './route.js';
import { RoutingTable, passesGuard } from './routing-table.js';
import { wildcardClosure, type Transition } from './transition.js';
import { composeDisposables, weakDisposable } from './disposable.js';
import {
  DEFAULT_PRIORITY,
  HandlerExecutionError,
  type Disposable,
  type ExecutionError,
  type Handler,
  type HandlerInfo,
  type HandlerOptions,
  type MachineOptions,
  type RouteMapping,
  type RouteMappingOptions,
  type RouteOptions,
  type RouteQuery,
  type SetupFunction,
  type StateListener,
  type TransitionContext,
} from './types.js';

interface MappingEntry<T> {
  id: number;
  mapping: T;
}

/**
 * Build the frozen context handed to guards and handlers
 * @internal
 */
export const createContext = <S, E>(
  event: E | undefined,
  from: S,
  to: S,
  payload: unknown
): TransitionContext<S, E> => Object.freeze({ event, from, to, payload });

/**
 * Event-driven state machine
 *
 * @example
 * ```ts
 * const door = new Machine<'open' | 'closed', 'push' | 'pull'>('closed', (m) => {
 *   m.addRoutes('push', [transition('closed', 'open')]);
 *   m.addRoutes('pull', [transition('open', 'closed')]);
 *   m.addHandler('push', ({ from, to }) => console.log(`${from} -> ${to}`));
 * });
 *
 * door.tryEvent('push'); // true, state is 'open'
 * door.tryEvent('push'); // false, error handlers run
 * ```
 */
export class Machine<S, E = never> {
  protected currentState: S;
  protected options: Required<MachineOptions<S, E>>;
  protected readonly stateEquality: Equality<S>;

  private eventRoutes: KeyedMap<Identity<E>, RoutingTable<S, E>>;
  private routeMappings: MappingEntry<RouteMapping<S, E>>[] = [];
  private eventHandlers: HandlerRegistry<Identity<E>, S, E>;
  private errorHandlers: HandlerInfo<S, E>[] = [];
  private stateListeners: MappingEntry<StateListener<S>>[] = [];
  private registrationCounter = 0;
  private dispatchDepth = 0;
  private executionErrors: ExecutionError<S, E>[] = [];

  constructor(
    state: S,
    setup?: SetupFunction<Machine<S, E>>,
    options: MachineOptions<S, E> = {}
  ) {
    this.options = {
      stateEquality: options.stateEquality ?? defaultEquality,
      eventEquality: options.eventEquality ?? defaultEquality,
      errorBoundary: options.errorBoundary ?? true,
      onError: options.onError ?? ((error: Error) => {
        console.error('Switchyard handler error:', error);
      }),
      debug: options.debug ?? false,
      maxHandlers: options.maxHandlers ?? Infinity,
    };

    this.currentState = state;
    this.stateEquality = this.options.stateEquality;
    this.eventRoutes = new KeyedMap(identityEquality(this.options.eventEquality));
    this.eventHandlers = new HandlerRegistry(identityEquality(this.options.eventEquality));

    if (this.options.debug) {
      console.debug('[Switchyard] Machine initialized', {
        state,
        errorBoundary: this.options.errorBoundary,
        maxHandlers: this.options.maxHandlers,
      });
    }

    if (setup) {
      this.configure(setup);
    }
  }

  /**
   * Current state
   */
  get state(): S {
    return this.currentState;
  }

  /**
   * Run a setup callback that adds routes and handlers
   */
  configure(setup: SetupFunction<this>): this {
    setup(this);
    return this;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Check event routes and route mappings for a transition
   *
   * With an event, only the routes of that event and of the `ANY` event are
   * searched; without one, the routes of every event are.
   */
  hasRoute(query: RouteQuery<S, E>): boolean {
    const { event, from, to, payload } = query;
    return (
      this.eventRoutesApprove(event, from, to, payload) ||
      this.routeMappingsApprove(event, from, to, payload)
    );
  }

  /**
   * Resolve the destination an event would lead to from the current state
   * @returns The preferred destination, or undefined if the event is not routed
   */
  canTryEvent(event: E, payload?: unknown): S | undefined {
    return this.resolveEvent(event, payload)?.to;
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  /**
   * Trigger a state change with an event
   *
   * On success the state is updated, then the handlers of the event (and of
   * the `ANY` event) run in priority order. On failure nothing changes and
   * the error handlers run.
   *
   * @returns true if the state changed
   */
  tryEvent(event: E, payload?: unknown): boolean {
    const from = this.currentState;
    const resolved = this.resolveEvent(event, payload);

    if (!resolved) {
      this.fail(event, from, payload);
      return false;
    }

    const handlers = this.eventHandlers.collect([toIdentity<E>(event), ANY]);
    this.commit(createContext(event, from, resolved.to, payload), handlers);
    return true;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Route transitions through an event
   *
   * `options.guard` applies to every registered route; `options.handler`
   * is added as a handler of the event.
   *
   * @example
   * ```ts
   * machine.addRoutes('retry', [transition('failed', 'loading')], {
   *   guard: ({ payload }) => payload !== 'fatal',
   * });
   * machine.addRoutes(ANY, [transition(ANY, 'idle')]);
   * ```
   */
  addRoutes(
    event: E | Identity<E>,
    routes: ReadonlyArray<Transition<S> | Route<S, E>>,
    options: RouteOptions<S, E> = {}
  ): Disposable {
    const eventId = toIdentity(event);
    const disposables = routes.map((target) =>
      this.addEventRoute(eventId, toRoute(target, options.guard))
    );

    if (options.handler) {
      disposables.push(this.addHandler(eventId, options.handler));
    }

    return composeDisposables(...disposables);
  }

  /**
   * Add a free-form route
   *
   * With `options.handler`, the handler runs for event-driven transitions
   * whose destination is the one the mapping prefers.
   */
  addRouteMapping(
    mapping: RouteMapping<S, E>,
    options: RouteMappingOptions<S, E> = {}
  ): Disposable {
    const id = this.nextId();
    this.routeMappings.push({ id, mapping });

    if (this.options.debug) {
      console.debug('[Switchyard] Route mapping added', {
        mappingId: id,
        totalMappings: this.routeMappings.length,
      });
    }

    const mappingDisposable = weakDisposable(this, (machine) => machine.removeRouteMapping(id));

    const { handler } = options;
    if (!handler) {
      return mappingDisposable;
    }

    const equality = this.stateEquality;
    const handlerDisposable = this.addHandler(
      ANY,
      (context) => {
        const preferred = mapping(context.event, context.from, context.payload);
        if (preferred !== undefined && equality.equals(preferred, context.to)) {
          handler(context);
        }
      },
      { priority: options.priority }
    );

    return composeDisposables(mappingDisposable, handlerDisposable);
  }

  /**
   * Add a handler for transitions triggered by `event` (or by any event with `ANY`)
   */
  addHandler(
    event: E | Identity<E>,
    handler: Handler<S, E>,
    options: HandlerOptions = {}
  ): Disposable {
    const eventId = toIdentity(event);
    const info = this.createHandlerInfo(handler, options);
    const size = this.eventHandlers.add(eventId, info);
    this.traceHandlerAdded('event', info, size);

    return weakDisposable(this, (machine) => machine.removeEventHandler(eventId, info.id));
  }

  /**
   * Add a handler for failed transitions
   *
   * Error handlers receive a context whose `to` is the unchanged state.
   */
  addErrorHandler(handler: Handler<S, E>, options: HandlerOptions = {}): Disposable {
    const info = this.createHandlerInfo(handler, options);
    insertHandler(this.errorHandlers, info);
    this.traceHandlerAdded('error', info, this.errorHandlers.length);

    return weakDisposable(this, (machine) => machine.removeErrorHandler(info.id));
  }

  /**
   * Observe state changes
   *
   * Listeners run after the handlers of every successful transition, inside
   * the same error boundary.
   */
  subscribe(listener: StateListener<S>): Disposable {
    const id = this.nextId();
    this.stateListeners.push({ id, mapping: listener });
    return weakDisposable(this, (machine) => machine.removeStateListener(id));
  }

  // ==========================================================================
  // Utilities
  // ==========================================================================

  /**
   * Number of registered handlers, error handlers included
   */
  handlerCount(): number {
    return this.eventHandlers.count() + this.errorHandlers.length;
  }

  /**
   * Number of registered event routes
   */
  routeCount(): number {
    let total = 0;
    for (const table of this.eventRoutes.values()) {
      total += table.count();
    }
    return total;
  }

  /**
   * Errors thrown by handlers during the last dispatch pass
   */
  getExecutionErrors(): ReadonlyArray<ExecutionError<S, E>> {
    return this.executionErrors;
  }

  clearExecutionErrors(): void {
    this.executionErrors = [];
  }

  /**
   * Enable/disable debug logging
   */
  debug(enabled: boolean): void {
    this.options.debug = enabled;
    console.debug(`[Switchyard] Debug mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  // ==========================================================================
  // Internals shared with StateMachine
  // ==========================================================================

  protected nextId(): number {
    return ++this.registrationCounter;
  }

  protected createHandlerInfo(handler: Handler<S, E>, options: HandlerOptions): HandlerInfo<S, E> {
    return {
      id: this.nextId(),
      priority: options.priority ?? DEFAULT_PRIORITY,
      callback: handler,
      active: true,
    };
  }

  protected traceHandlerAdded(kind: string, info: HandlerInfo<S, E>, listSize: number): void {
    if (this.options.debug) {
      console.debug('[Switchyard] Handler added', {
        kind,
        handlerId: info.id,
        priority: info.priority,
        listSize,
      });
    }

    if (this.options.maxHandlers > 0 && listSize > this.options.maxHandlers) {
      console.warn(
        `MaxHandlersExceeded: ${listSize} ${kind} handlers share one key (limit: ${this.options.maxHandlers})`
      );
    }
  }

  /**
   * Apply a resolved transition: update the state, run `handlers`, notify observers
   */
  protected commit(context: TransitionContext<S, E>, handlers: HandlerInfo<S, E>[]): void {
    this.currentState = context.to;

    if (this.options.debug) {
      console.debug('[Switchyard] Transition', {
        event: context.event,
        from: context.from,
        to: context.to,
        handlerCount: handlers.length,
      });
    }

    try {
      this.dispatch(handlers, context);
    } finally {
      for (const { id, mapping: listener } of [...this.stateListeners]) {
        this.runGuarded(id, context, () => listener(context.to, context.from));
      }
    }
  }

  /**
   * Report a transition that no route approved
   */
  protected fail(event: E | undefined, from: S, payload: unknown): void {
    const context = createContext(event, from, this.currentState, payload);

    if (this.options.debug) {
      console.debug('[Switchyard] Transition rejected', {
        event,
        from,
        errorHandlerCount: this.errorHandlers.length,
      });
    }

    this.dispatch([...this.errorHandlers], context);
  }

  /**
   * Run handlers in order, honoring the error boundary.
   * Entries removed while the pass is running are skipped.
   */
  protected dispatch(handlers: readonly HandlerInfo<S, E>[], context: TransitionContext<S, E>): void {
    if (this.dispatchDepth === 0) {
      this.executionErrors = [];
    }
    this.dispatchDepth++;

    try {
      for (const info of handlers) {
        if (info.active) {
          this.runGuarded(info.id, context, () => info.callback(context));
        }
      }
    } finally {
      this.dispatchDepth--;
    }
  }

  /**
   * Run one callback (handler or state observer) inside the error boundary
   */
  private runGuarded(id: number, context: TransitionContext<S, E>, callback: () => void): void {
    try {
      callback();
    } catch (thrown) {
      const error = thrown instanceof Error ? thrown : new HandlerExecutionError(id, thrown);
      this.executionErrors.push({ handlerId: id, error, context });

      if (this.options.debug) {
        console.debug('[Switchyard] Handler error', {
          handlerId: id,
          error: error.message,
        });
      }

      if (!this.options.errorBoundary) {
        throw error;
      }
      this.options.onError(error, context);
    }
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  /**
   * Search the event routing tables for the wildcard closure of from => to
   */
  protected eventRoutesApprove(event: E | undefined, from: S, to: S, payload: unknown): boolean {
    const keys = wildcardClosure(from, to);
    const context = createContext(event, from, to, payload);

    for (const [eventId, table] of this.eventRoutes.entries()) {
      if (event !== undefined && !matches<E>(event, eventId, this.options.eventEquality)) {
        continue;
      }
      if (table.approves(keys, context)) {
        return true;
      }
    }
    return false;
  }

  private routeMappingsApprove(event: E | undefined, from: S, to: S, payload: unknown): boolean {
    return this.routeMappings.some(({ mapping }) => {
      const preferred = mapping(event, from, payload);
      return preferred !== undefined && this.stateEquality.equals(preferred, to);
    });
  }

  /**
   * Find the destination of `event` from the current state.
   * A `from => ANY` route keeps the current state as destination.
   */
  private resolveEvent(event: E, payload: unknown): { to: S } | undefined {
    const state = this.currentState;
    const tables = [this.eventRoutes.get(toIdentity<E>(event)), this.eventRoutes.get(ANY)];

    for (const table of tables) {
      if (!table) {
        continue;
      }
      for (const [transition, entries] of table.entries()) {
        if (!matches<S>(state, transition.from, this.stateEquality)) {
          continue;
        }
        const to = transition.to.kind === 'some' ? transition.to.value : state;
        const context = createContext(event, state, to, payload);
        if (entries.some((entry) => passesGuard(entry.guard, context))) {
          return { to };
        }
      }
    }

    for (const { mapping } of this.routeMappings) {
      const preferred = mapping(event, state, payload);
      if (preferred !== undefined) {
        return { to: preferred };
      }
    }

    return undefined;
  }

  // ==========================================================================
  // Removal
  // ==========================================================================

  private addEventRoute(eventId: Identity<E>, target: Route<S, E>): Disposable {
    const id = this.nextId();
    const table = this.eventRoutes.ensure(eventId, () => new RoutingTable<S, E>(this.stateEquality));
    table.add(target.transition, id, target.guard);

    if (this.options.debug) {
      console.debug('[Switchyard] Route added', {
        routeId: id,
        transition: target.transition.toString(),
        guarded: target.guard !== undefined,
      });
    }

    const { transition } = target;
    return weakDisposable(this, (machine) => machine.removeEventRoute(eventId, transition, id));
  }

  private removeEventRoute(eventId: Identity<E>, transition: Transition<S>, id: number): void {
    const table = this.eventRoutes.get(eventId);
    if (!table || !table.remove(transition, id)) {
      return;
    }
    if (table.isEmpty) {
      this.eventRoutes.delete(eventId);
    }
    this.traceRemoval('Route removed', id);
  }

  private removeRouteMapping(id: number): void {
    const before = this.routeMappings.length;
    this.routeMappings = this.routeMappings.filter((entry) => entry.id !== id);
    if (this.routeMappings.length < before) {
      this.traceRemoval('Route mapping removed', id);
    }
  }

  private removeEventHandler(eventId: Identity<E>, id: number): void {
    if (this.eventHandlers.remove(eventId, id)) {
      this.traceRemoval('Handler removed', id);
    }
  }

  private removeErrorHandler(id: number): void {
    if (removeHandler(this.errorHandlers, id)) {
      this.traceRemoval('Error handler removed', id);
    }
  }

  private removeStateListener(id: number): void {
    this.stateListeners = this.stateListeners.filter((entry) => entry.id !== id);
  }

  protected traceRemoval(message: string, id: number): void {
    if (this.options.debug) {
      console.debug(`[Switchyard] ${message}`, { id });
    }
  }
}

/**
 * Factory function to create a Machine instance
 */
export const createMachine = <S, E = never>(
  state: S,
  setup?: SetupFunction<Machine<S, E>>,
  options?: MachineOptions<S, E>
): Machine<S, E> => {
  return new Machine<S, E>(state, setup, options);
};
