import { decisionToJson } from '../../engine/decision';
import type { CheckContext, CheckResult } from '../../guard/guardService';
import { formatGuardError } from '../../types/errors';

export type ContextProvider = () => CheckContext;

export function jsonContent(value: unknown, isError = false) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(value, null, 2),
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

export function checkResultContent(result: CheckResult) {
  if (!result.ok) {
    return jsonContent({ ok: false, error: formatGuardError(result.error) }, true);
  }
  return jsonContent({
    ok: true,
    ...decisionToJson(result.decision),
    load_errors: result.catalog.errors.map(formatGuardError),
  });
}
