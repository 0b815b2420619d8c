export interface LoadError {
  kind: 'load';
  file: string;
  field?: string;
  message: string;
}

export interface EvaluationError {
  kind: 'evaluation';
  ruleId?: string;
  message: string;
}

export interface ConfigurationError {
  kind: 'configuration';
  path: string;
  message: string;
}

export type GuardError = LoadError | EvaluationError | ConfigurationError;

export function formatGuardError(error: GuardError): string {
  switch (error.kind) {
    case 'load':
      return error.field
        ? `${error.file}: ${error.field}: ${error.message}`
        : `${error.file}: ${error.message}`;
    case 'evaluation':
      return error.ruleId ? `rule "${error.ruleId}": ${error.message}` : `evaluation failed: ${error.message}`;
    case 'configuration':
      return `${error.path}: ${error.message}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
