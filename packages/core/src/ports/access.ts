export interface AccessRequest {
    tenantId: string;
    operation: string;
    executionId: string;
    nodeId: string;
}

export type AccessDecision =
    | { allowed: true }
    | { allowed: false; code: 'quota_exceeded' | 'access_denied'; reason: string };

/** Tenant quota/authorization gate consulted before every node step. */
export interface AccessGate {
    authorize(request: AccessRequest): Promise<AccessDecision>;
}
