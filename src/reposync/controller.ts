import type { CommandExecutor } from '@/reposync/effects';
import { errorMessage } from '@/reposync/lib/errors';
import { createLogger, type Logger } from '@/reposync/lib/logger';
import type { AppEvent, Command } from '@/reposync/messages';
import { startSession } from '@/reposync/mode';
import type { AppState } from '@/reposync/state';
import { update } from '@/reposync/update';

type StateListener = (state: AppState) => void;

/**
 * Owns the workflow state. Events are applied one at a time through
 * `update`; the commands it returns run on the executor and their results
 * come back through `dispatch` like any other event.
 */
export class WorkflowController {
  private state: AppState;
  private readonly listeners = new Set<StateListener>();
  private readonly idleWaiters: Array<() => void> = [];
  private pending = 0;

  constructor(
    initialState: AppState,
    private readonly executor: CommandExecutor,
    private readonly logger: Logger = createLogger('[workflow] '),
  ) {
    this.state = initialState;
  }

  getState = (): AppState => this.state;

  subscribe = (listener: StateListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /** Issues the commands every session begins with. */
  start(): void {
    const [next, commands] = startSession(this.state);
    this.commit(next, commands);
  }

  dispatch = (event: AppEvent): void => {
    const [next, commands] = update(this.state, event);
    this.commit(next, commands);
  };

  /** Resolves once no command is outstanding. */
  idle(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Resolves with the first state, current or future, that satisfies `predicate`. */
  until(predicate: (state: AppState) => boolean): Promise<AppState> {
    if (predicate(this.state)) {
      return Promise.resolve(this.state);
    }
    return new Promise((resolve) => {
      const unsubscribe = this.subscribe((state) => {
        if (predicate(state)) {
          unsubscribe();
          resolve(state);
        }
      });
    });
  }

  private commit(next: AppState, commands: Command[]): void {
    if (next !== this.state) {
      this.state = next;
      for (const listener of [...this.listeners]) {
        listener(next);
      }
    }
    for (const command of commands) {
      this.schedule(command);
    }
  }

  private schedule(command: Command): void {
    this.pending += 1;

    void this.executor
      .execute(command)
      .then(
        (event) => {
          if (event) {
            this.dispatch(event);
          }
        },
        (error: unknown) => {
          this.logger.error(`command ${command.kind} failed: ${errorMessage(error)}`);
          this.dispatch({ type: 'commandFailed', message: errorMessage(error) });
        },
      )
      .finally(() => {
        this.pending -= 1;
        if (this.pending === 0) {
          for (const resolve of this.idleWaiters.splice(0)) {
            resolve();
          }
        }
      });
  }
}
