// libmerge/src/types.ts
// Marker types understood by the merge engine.

/** Scalar wrapped with an explicit precedence. Lower number wins. */
export interface Override<T = unknown> {
    readonly __type: 'override';
    readonly priority: number;
    readonly value: T;
}

/** List fragment placed at a sort position in the merged list. */
export interface Ordered<T = unknown> {
    readonly __ordered: true;
    readonly order: number;
    readonly items: T[];
}

/** Segment of an accumulated list. */
export interface Segment<T = unknown> {
    order: number;
    items: T[];
}

/** Accumulated list fragments, flattened by `resolve()`. */
export interface OrderedList<T = unknown> {
    readonly __orderedList: true;
    readonly segments: Array<Segment<T>>;
}

/** A configuration fragment contributed by one module. */
export type Fragment = Record<string, unknown>;

/** Combines the accumulated state with one more fragment. */
export type MergeFn = (current: Fragment, extension: Fragment) => Fragment;

/**
 * A module receives the state merged so far and a caller-defined context,
 * and returns the fragment it contributes.
 */
export type ConfigModule<Ctx> = (prev: Fragment, ctx: Ctx) => Fragment;
