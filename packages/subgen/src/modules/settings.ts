// subgen/src/modules/settings.ts — user overrides from the settings file

import type { Fragment } from 'libmerge';
import type { RenderContext } from './context.js';

/**
 * Bare values outrank the `mkDefault` fragments of the general and DNS
 * modules. Reserved keys are rejected when the file is loaded.
 */
export default function settingsModule(_prev: Fragment, ctx: RenderContext): Fragment {
    return { ...ctx.settings };
}
