import { useEffect, useRef, useState } from 'react';
import { TimerTickResponseSchema } from '../types/api';
import { errorMessage, postJson } from '../utils/api-client';

export type TickSender = (n: number) => Promise<number>;

export const sendTimerTick: TickSender = async n => {
  const { n: acknowledged } = await postJson('/api/timer', { n }, TimerTickResponseSchema);
  return acknowledged;
};

interface SystemTimerState {
  /** Last tick counter echoed back by the server */
  n: number;
  error: string | null;
}

/**
 * Periodic system timer. Every `intervalMs` the counter advances and the
 * tick is posted to the server, which fans it out as a timer event.
 * A null interval leaves the timer stopped.
 */
export function useSystemTimer(intervalMs: number | null, send: TickSender = sendTimerTick): SystemTimerState {
  const counterRef = useRef(0);
  const [state, setState] = useState<SystemTimerState>({ n: 0, error: null });

  useEffect(() => {
    if (intervalMs === null || intervalMs <= 0) {
      return undefined;
    }

    const intervalId = window.setInterval(() => {
      counterRef.current += 1;
      send(counterRef.current)
        .then(n => setState({ n, error: null }))
        .catch((error: unknown) => {
          const message = errorMessage(error);
          console.error('Timer tick failed:', message);
          setState(prev => ({ ...prev, error: message }));
        });
    }, intervalMs);

    return () => window.clearInterval(intervalId);
  }, [intervalMs, send]);

  return state;
}
