import type { Reducer } from "evented";

export const sum: Reducer<number> = (previous, next) => previous + next;

export const max: Reducer<number> = (previous, next) => Math.max(previous, next);

export const min: Reducer<number> = (previous, next) => Math.min(previous, next);
