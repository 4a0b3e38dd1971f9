/**
 * Reasons a planning call can fail. Callers branch on `kind`.
 */
export type AgentFailureKind =
    | 'no_active_plan'
    | 'upstream_unavailable'
    | 'upstream_contract_violation'
    | 'internal';

export type AgentFailure =
    | { kind: 'no_active_plan'; message: string }
    | { kind: 'upstream_unavailable'; message: string }
    | { kind: 'upstream_contract_violation'; message: string; issues: string[] }
    | { kind: 'internal'; message: string };

export type AgentResult<T> =
    | { ok: true; value: T }
    | { ok: false; failure: AgentFailure };

export function success<T>(value: T): AgentResult<T> {
    return { ok: true, value };
}

export function failure<T>(reason: AgentFailure): AgentResult<T> {
    return { ok: false, failure: reason };
}

export function noActivePlan(conversationId: string): AgentFailure {
    return { kind: 'no_active_plan', message: `No active plan found for conversation ${conversationId}` };
}
