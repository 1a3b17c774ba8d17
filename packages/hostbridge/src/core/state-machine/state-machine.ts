import { IllegalTransitionError } from "../errors";
import type { StateMachineConfig, TransitionListener } from "./types";

/** Table-driven finite state machine used for policy registration and environment lifecycle. */
export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly _transitions: Record<TState, TState[]>;
    private readonly _name: string;
    private readonly _violation: (message: string) => Error;
    private readonly _listeners: Set<TransitionListener<TState>> = new Set();

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this._transitions = config.transitions;
        this._name = config.name ?? "StateMachine";
        this._violation = config.violation ?? ((message) => new IllegalTransitionError(message));
    }

    get current(): TState {
        return this._current;
    }

    get name(): string {
        return this._name;
    }

    is(...states: TState[]): boolean {
        return states.includes(this._current);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new IllegalTransitionError(`Illegal transition: "${this._current}" → "${target}" for "${this._name}"`);
        }
        const from = this._current;
        this._current = target;
        for (const listener of this._listeners) {
            listener(from, target);
        }
    }

    canTransition(target: TState): boolean {
        return this._transitions[this._current].includes(target);
    }

    assertState(...allowed: TState[]): void {
        if (!allowed.includes(this._current)) {
            const list = allowed.map((s) => `"${s}"`).join(", ");
            throw this._violation(`"${this._name}" expected state ${list}, but current is "${this._current}"`);
        }
    }

    onTransition(cb: TransitionListener<TState>): () => void {
        this._listeners.add(cb);
        return () => {
            this._listeners.delete(cb);
        };
    }
}
