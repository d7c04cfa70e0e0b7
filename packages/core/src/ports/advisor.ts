import type { RoutingAdviceRequest } from '../contracts/routing';

/**
 * AI-assisted routing capability. The response is `unknown` until the router
 * validates it; malformed advice falls back to plain scoring.
 */
export interface RoutingAdvisor {
    recommend(request: RoutingAdviceRequest, signal: AbortSignal): Promise<unknown>;
}
