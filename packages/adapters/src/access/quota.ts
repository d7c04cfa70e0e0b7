import type { AccessDecision, AccessGate, AccessRequest } from '@weave/core';

export interface StaticQuotaGateOptions {
    /** Maximum node steps per tenant; tenants without an entry use `defaultLimit`. */
    limits?: Record<string, number>;
    defaultLimit?: number;
    /** Tenants that may not run anything. */
    deniedTenants?: string[];
}

/**
 * In-process gate that counts node steps per tenant against fixed limits.
 */
export class StaticQuotaGate implements AccessGate {
    private readonly usage = new Map<string, number>();
    private readonly denied: Set<string>;

    constructor(private readonly options: StaticQuotaGateOptions = {}) {
        this.denied = new Set(options.deniedTenants);
    }

    public async authorize(request: AccessRequest): Promise<AccessDecision> {
        if (this.denied.has(request.tenantId)) {
            return { allowed: false, code: 'access_denied', reason: `tenant may not perform ${request.operation}` };
        }

        const limit = this.options.limits?.[request.tenantId] ?? this.options.defaultLimit ?? Number.POSITIVE_INFINITY;
        const used = this.usage.get(request.tenantId) ?? 0;
        if (used >= limit) {
            return { allowed: false, code: 'quota_exceeded', reason: `${used}/${limit} node steps used` };
        }

        this.usage.set(request.tenantId, used + 1);
        return { allowed: true };
    }

    public usageOf(tenantId: string): number {
        return this.usage.get(tenantId) ?? 0;
    }

    public reset(tenantId?: string): void {
        if (tenantId === undefined) {
            this.usage.clear();
        } else {
            this.usage.delete(tenantId);
        }
    }
}

export class AllowAllGate implements AccessGate {
    public async authorize(): Promise<AccessDecision> {
        return { allowed: true };
    }
}
