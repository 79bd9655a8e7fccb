// @vitest-environment jsdom
import type { EventEmitter } from 'events';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { act, cleanup, renderHook } from '@testing-library/react';
import { useSocket } from './useSocket';

interface FakeSocket extends EventEmitter {
  connected: boolean;
  disconnect: Mock;
}

const sockets = vi.hoisted((): FakeSocket[] => []);

vi.mock('socket.io-client', async () => {
  const { EventEmitter } = await import('events');
  return {
    io: vi.fn(() => {
      const socket = Object.assign(new EventEmitter(), { connected: false, disconnect: vi.fn() });
      sockets.push(socket);
      return socket;
    }),
  };
});

afterEach(() => {
  cleanup();
  sockets.length = 0;
});

describe('useSocket', () => {
  it('exposes only the connection state', () => {
    const { result } = renderHook(() => useSocket(vi.fn()));

    expect(result.current).toEqual({ isConnected: false });
  });

  it('tracks connect and disconnect', () => {
    const { result } = renderHook(() => useSocket(vi.fn()));
    const [socket] = sockets;

    act(() => {
      socket.emit('connect');
    });
    expect(result.current.isConnected).toBe(true);

    act(() => {
      socket.emit('disconnect');
    });
    expect(result.current.isConnected).toBe(false);
  });

  it('dispatches decoded feed events and disconnects on unmount', () => {
    const dispatch = vi.fn();
    const { unmount } = renderHook(() => useSocket(dispatch));
    const [socket] = sockets;

    socket.emit('columns', [{ columnName: 'Backlog', date: '2024-04-30' }]);
    expect(dispatch).toHaveBeenCalledWith({ type: 'COLUMNS_RECEIVED', columns: [{ name: 'Backlog', date: '2024-04-30' }] });

    unmount();
    expect(socket.disconnect).toHaveBeenCalledTimes(1);
    expect(socket.listenerCount('columns')).toBe(0);
  });
});
