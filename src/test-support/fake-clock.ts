import { Clock } from '../utils/clock.util';

export class FakeClock implements Clock {
  private current: number;

  constructor(start: string | number = '2026-03-01T12:00:00Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(deltaMs: number): Date {
    this.current += deltaMs;
    return this.now();
  }

  set(at: string | number): void {
    this.current = new Date(at).getTime();
  }
}
