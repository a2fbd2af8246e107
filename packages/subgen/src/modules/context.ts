// subgen/src/modules/context.ts

import type { ConfigModule } from 'libmerge';
import type { PolicyDocument } from '../lib/assemble.js';

export interface RenderContext {
    policy: PolicyDocument;
    ipv6Enabled: boolean;
    dnsMode: string;
    /** Overrides from the settings file, applied last. */
    settings: Record<string, unknown>;
}

export type RenderModule = ConfigModule<RenderContext>;
