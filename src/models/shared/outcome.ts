export type Outcome<T, E = Error> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const success = <T>(value: T): Outcome<T, never> => ({ ok: true, value });

export const failure = <E>(error: E): Outcome<never, E> => ({ ok: false, error });
