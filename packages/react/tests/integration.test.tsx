// @vitest-environment jsdom
/**
 * React adapter lifecycle integration tests
 * Tests mount/unmount cleanup with several components sharing one machine
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { act, cleanup, render, screen } from '@testing-library/react';
import { StrictMode, useState } from 'react';
import { ANY, createStateMachine, transition, type StateMachine } from 'switchyard';
import {
  MachineProvider,
  useErrorHandler,
  useMachineState,
  useTransitionHandler,
} from '../src/index.js';

type Door = 'open' | 'closed' | 'locked';

const INTO_CLOSED = transition<Door>(ANY, 'closed');
const INTO_LOCKED = transition<Door>(ANY, 'locked');

describe('React adapter lifecycle integration', () => {
  let door: StateMachine<Door>;

  beforeEach(() => {
    door = createStateMachine<Door>('open', (m) => {
      m.addRoute(transition('open', 'closed'));
      m.addRoute(transition('closed', 'open'));
      m.addRoute(transition('closed', 'locked'));
      m.addRoute(transition('locked', 'closed'));
    });
  });

  afterEach(() => {
    cleanup();
  });

  describe('Component mount/unmount cleanup', () => {
    it('revokes every handler of a component on unmount', () => {
      const onClosed = vi.fn();
      const onLocked = vi.fn();
      const onRejected = vi.fn();

      function Watcher() {
        useTransitionHandler<Door>(INTO_CLOSED, onClosed);
        useTransitionHandler<Door>(INTO_LOCKED, onLocked);
        useErrorHandler<Door>(onRejected);
        return null;
      }

      const { unmount } = render(
        <MachineProvider machine={door}>
          <Watcher />
        </MachineProvider>
      );
      expect(door.handlerCount()).toBe(3);

      act(() => {
        door.tryState('closed');
        door.tryState('locked');
        door.tryState('open');
      });
      expect(onClosed).toHaveBeenCalledTimes(1);
      expect(onLocked).toHaveBeenCalledTimes(1);
      expect(onRejected).toHaveBeenCalledTimes(1);

      unmount();
      expect(door.handlerCount()).toBe(0);

      door.tryState('closed');
      door.tryState('locked');
      door.tryState('open');
      expect(door.state).toBe('locked');
      expect(onClosed).toHaveBeenCalledTimes(1);
      expect(onLocked).toHaveBeenCalledTimes(1);
      expect(onRejected).toHaveBeenCalledTimes(1);
    });

    it('keeps handlers of sibling components independent', () => {
      const handlerA = vi.fn();
      const handlerB = vi.fn();

      function WatcherA() {
        useTransitionHandler<Door>(INTO_CLOSED, handlerA);
        return null;
      }

      function WatcherB() {
        useTransitionHandler<Door>(INTO_CLOSED, handlerB);
        return null;
      }

      function Toggle() {
        const [showA, setShowA] = useState(true);
        return (
          <>
            {showA && <WatcherA />}
            <WatcherB />
            <button onClick={() => setShowA(false)}>hide</button>
          </>
        );
      }

      render(
        <MachineProvider machine={door}>
          <Toggle />
        </MachineProvider>
      );
      expect(door.handlerCount()).toBe(2);

      act(() => {
        screen.getByText('hide').click();
      });
      expect(door.handlerCount()).toBe(1);

      act(() => {
        door.tryState('closed');
      });
      expect(handlerA).not.toHaveBeenCalled();
      expect(handlerB).toHaveBeenCalledTimes(1);
    });
  });

  describe('StrictMode', () => {
    it('leaves exactly one registration after the double effect run', () => {
      const handler = vi.fn();

      function Watcher() {
        useTransitionHandler<Door>(INTO_CLOSED, handler);
        return null;
      }

      render(
        <StrictMode>
          <MachineProvider machine={door}>
            <Watcher />
          </MachineProvider>
        </StrictMode>
      );
      expect(door.handlerCount()).toBe(1);

      act(() => {
        door.tryState('closed');
      });
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('Shared machine', () => {
    it('renders the same state in every subscribed component', () => {
      function Label({ testId }: { testId: string }) {
        return <span data-testid={testId}>{useMachineState<Door>()}</span>;
      }

      render(
        <MachineProvider machine={door}>
          <Label testId="first" />
          <Label testId="second" />
        </MachineProvider>
      );

      act(() => {
        door.tryState('closed');
      });

      expect(screen.getByTestId('first').textContent).toBe('closed');
      expect(screen.getByTestId('second').textContent).toBe('closed');
    });

    it('stops updating a component after it unmounts', () => {
      let renders = 0;

      function Label() {
        renders++;
        return <span>{useMachineState<Door>()}</span>;
      }

      const { unmount } = render(
        <MachineProvider machine={door}>
          <Label />
        </MachineProvider>
      );
      unmount();
      const before = renders;

      door.tryState('closed');

      expect(renders).toBe(before);
    });
  });
});
