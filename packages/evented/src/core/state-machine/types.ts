export type StateMachineConfig<TState extends string> = {
    transitions: Readonly<Record<TState, readonly TState[]>>;
    initial: TState;
    name?: string;
};

export type TransitionListener<TState extends string> = (from: TState, to: TState) => void;
