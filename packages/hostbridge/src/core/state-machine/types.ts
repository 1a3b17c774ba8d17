export type StateMachineConfig<TState extends string> = {
    transitions: Record<TState, TState[]>;
    initial: TState;
    name?: string;
    /** Builds the error thrown by {@link StateMachine.assertState}. Defaults to `IllegalTransitionError`. */
    violation?: (message: string) => Error;
};

export type TransitionListener<TState extends string> = (from: TState, to: TState) => void;
