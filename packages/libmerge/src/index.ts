// libmerge/src/index.ts
// Public API.

export type {
    Override,
    Ordered,
    OrderedList,
    Segment,
    Fragment,
    MergeFn,
    ConfigModule,
} from './types.js';

export {
    DEFAULT_PRIORITY,
    MKDEFAULT_PRIORITY,
    MKFORCE_PRIORITY,
    mkOverride,
    mkDefault,
    mkForce,
    isOverride,
    getPriority,
    unwrapPriority,
} from './priority.js';

export {
    BEFORE_ORDER,
    DEFAULT_ORDER,
    AFTER_ORDER,
    mkOrder,
    mkBefore,
    mkAfter,
    isOrdered,
    isOrderedList,
    isArrayLike,
} from './order.js';

export { moduleMerge, isPlainObject } from './merge.js';

export { resolve } from './resolve.js';

export { applyModules, cleanup } from './modules.js';
