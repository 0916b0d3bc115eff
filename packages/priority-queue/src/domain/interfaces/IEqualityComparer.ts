export type EqualityComparer<T> = (a: T, b: T) => boolean;
