// @vitest-environment jsdom
/**
 * Tests for useTransitionHandler, useEventHandler and useErrorHandler
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { act, cleanup, render } from '@testing-library/react';
import { ANY, createStateMachine, transition, type Handler } from 'switchyard';
import { MachineProvider } from './MachineProvider.js';
import { useErrorHandler, useEventHandler, useTransitionHandler } from './useTransitionHandler.js';

type Player = 'stopped' | 'playing';
type PlayerEvent = 'toggle';

const INTO_PLAYING = transition<Player>(ANY, 'playing');

const createPlayer = () =>
  createStateMachine<Player, PlayerEvent>('stopped', (m) => {
    m.addRoute(transition('stopped', 'playing'));
    m.addRoute(transition('playing', 'stopped'));
    m.addRoutes('toggle', [transition('stopped', 'playing')]);
  });

describe('useTransitionHandler', () => {
  afterEach(() => {
    cleanup();
  });

  it('registers the handler on mount', () => {
    const player = createPlayer();
    const handler = vi.fn();

    function Listener() {
      useTransitionHandler<Player, PlayerEvent>(INTO_PLAYING, handler);
      return null;
    }

    render(
      <MachineProvider machine={player}>
        <Listener />
      </MachineProvider>
    );

    act(() => {
      player.tryState('playing', 'go');
    });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({
      event: undefined,
      from: 'stopped',
      to: 'playing',
      payload: 'go',
    });
  });

  it('removes the handler on unmount', () => {
    const player = createPlayer();
    const handler = vi.fn();

    function Listener() {
      useTransitionHandler<Player, PlayerEvent>(INTO_PLAYING, handler);
      return null;
    }

    const { unmount } = render(
      <MachineProvider machine={player}>
        <Listener />
      </MachineProvider>
    );
    expect(player.handlerCount()).toBe(1);

    unmount();
    player.tryState('playing');

    expect(player.handlerCount()).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('re-registers when the handler changes', () => {
    const player = createPlayer();
    const first = vi.fn();
    const second = vi.fn();

    function Listener({ handler }: { handler: Handler<Player, PlayerEvent> }) {
      useTransitionHandler(INTO_PLAYING, handler);
      return null;
    }

    const { rerender } = render(
      <MachineProvider machine={player}>
        <Listener handler={first} />
      </MachineProvider>
    );
    rerender(
      <MachineProvider machine={player}>
        <Listener handler={second} />
      </MachineProvider>
    );

    act(() => {
      player.tryState('playing');
    });

    expect(player.handlerCount()).toBe(1);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });
});

describe('useEventHandler', () => {
  afterEach(() => {
    cleanup();
  });

  it('runs for event-driven transitions only', () => {
    const player = createPlayer();
    const handler = vi.fn();

    function Listener() {
      useEventHandler<Player, PlayerEvent>('toggle', handler);
      return null;
    }

    render(
      <MachineProvider machine={player}>
        <Listener />
      </MachineProvider>
    );

    act(() => {
      player.tryEvent('toggle');
      player.tryState('stopped');
    });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({
      event: 'toggle',
      from: 'stopped',
      to: 'playing',
      payload: undefined,
    });
  });
});

describe('useErrorHandler', () => {
  afterEach(() => {
    cleanup();
  });

  it('runs for rejected transitions until unmount', () => {
    const player = createPlayer();
    const handler = vi.fn();

    function Listener() {
      useErrorHandler<Player, PlayerEvent>(handler);
      return null;
    }

    const { unmount } = render(
      <MachineProvider machine={player}>
        <Listener />
      </MachineProvider>
    );

    act(() => {
      player.tryState('stopped');
    });
    expect(handler).toHaveBeenCalledTimes(1);

    unmount();
    player.tryState('stopped');

    expect(handler).toHaveBeenCalledTimes(1);
  });
});
