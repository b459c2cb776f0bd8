// MARK: - Access Decider
// Pure LOCKED/UNLOCKED transition function for shared channel access

export type AccessState = 'LOCKED' | 'UNLOCKED';
export type AccessDecision = 'HOLD' | 'GRANT' | 'REVOKE';

export interface DecisionInput {
  state: AccessState;
  totalWords: number;
  threshold: number;
  /** True once the daily boundary for the row's date has fired */
  boundaryFired?: boolean;
}

export function stateOf(hasAccess: boolean): AccessState {
  return hasAccess ? 'UNLOCKED' : 'LOCKED';
}

/**
 * The boundary forces REVOKE from any state. Otherwise GRANT fires only on
 * the LOCKED to UNLOCKED edge; an unlocked row holds for the rest of its day.
 */
export function decide(input: DecisionInput): AccessDecision {
  if (input.boundaryFired) {
    return 'REVOKE';
  }

  if (input.state === 'LOCKED' && input.totalWords >= input.threshold) {
    return 'GRANT';
  }

  return 'HOLD';
}

export function nextState(state: AccessState, decision: AccessDecision): AccessState {
  switch (decision) {
    case 'GRANT':
      return 'UNLOCKED';
    case 'REVOKE':
      return 'LOCKED';
    default:
      return state;
  }
}
