import { IllegalStateError } from "../errors";
import type { StateMachineConfig, TransitionListener } from "./types";

/**
 * Finite state machine over a string union.
 *
 * A state with no outgoing transitions is terminal: entering it notifies the
 * listeners one last time and then drops them.
 */
export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly _transitions: Readonly<Record<TState, readonly TState[]>>;
    private readonly _name: string;
    private readonly _listeners: Set<TransitionListener<TState>> = new Set();

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this._transitions = config.transitions;
        this._name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    is(state: TState): boolean {
        return this._current === state;
    }

    isTerminal(): boolean {
        return this._transitions[this._current].length === 0;
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new IllegalStateError(`Illegal transition: "${this._current}" → "${target}" for "${this._name}"`);
        }
        const from = this._current;
        this._current = target;
        const listeners = [...this._listeners];
        if (this.isTerminal()) this._listeners.clear();
        for (const listener of listeners) {
            listener(from, target);
        }
    }

    canTransition(target: TState): boolean {
        return this._transitions[this._current].includes(target);
    }

    /** Subscribe to transitions. Listeners added while in a terminal state are never called. */
    onTransition(cb: TransitionListener<TState>): () => void {
        if (this.isTerminal()) return () => {};
        this._listeners.add(cb);
        return () => {
            this._listeners.delete(cb);
        };
    }
}
