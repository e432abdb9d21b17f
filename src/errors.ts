export type ErrorCode =
  | 'AUTH'
  | 'NETWORK'
  | 'TIMEOUT'
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'INVALID_CONFIG'
  | 'INVALID_MANIFEST'
  | 'INVALID_PROJECT'
  | 'TOKEN_CYCLE'
  | 'TOKEN_UNRESOLVED'
  | 'TOKEN_DEPTH'
  | 'TOKEN_EVALUATION'
  | 'INTERNAL'
  | 'UNKNOWN';

export interface ActionableErrorFields {
  retryable: boolean;
  fixHint: string;
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ErrorCode, ActionableErrorFields> = {
  AUTH: {
    retryable: false,
    fixHint: 'Verify RS_USER/RS_PASS and that the account has Content Manager rights on the target folders.'
  },
  NETWORK: {
    retryable: true,
    fixHint: 'Check that the report portal URL is reachable from this host, then retry.'
  },
  TIMEOUT: {
    retryable: true,
    fixHint: 'Retry the deployment and raise RS_TIMEOUT_MS if the server is slow to respond.'
  },
  BAD_REQUEST: {
    retryable: false,
    fixHint: 'Inspect the server message; the item definition or its target path was rejected.'
  },
  NOT_FOUND: {
    retryable: false,
    fixHint: 'Confirm the catalog path exists and the portal URL points at the right instance.'
  },
  CONFLICT: {
    retryable: false,
    fixHint: 'An item of a different type already occupies the target path; rename or remove it.'
  },
  SERVER_ERROR: {
    retryable: true,
    fixHint: 'The report server failed internally; check its logs and retry.'
  },
  INVALID_CONFIG: {
    retryable: false,
    fixHint: 'Fix the environment variables listed in the message.'
  },
  INVALID_MANIFEST: {
    retryable: false,
    fixHint: 'Fix the deployment manifest fields listed in the message.'
  },
  INVALID_PROJECT: {
    retryable: false,
    fixHint: 'Check the report project file and the definitions it lists.'
  },
  TOKEN_CYCLE: {
    retryable: false,
    fixHint: 'Break the circular chain of token references shown in the message.'
  },
  TOKEN_UNRESOLVED: {
    retryable: false,
    fixHint: 'Define the missing token in the manifest or remove the reference.'
  },
  TOKEN_DEPTH: {
    retryable: false,
    fixHint: 'Flatten the token chain; it nests deeper than the resolver allows.'
  },
  TOKEN_EVALUATION: {
    retryable: false,
    fixHint: 'A deferred token failed to evaluate; set the environment variable it reads or give it a default.'
  },
  INTERNAL: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the logs and the deployment journal.'
  },
  UNKNOWN: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the logs.'
  }
};

export function actionableErrorFields(code: ErrorCode): ActionableErrorFields {
  const defaults = ACTIONABLE_ERROR_DEFAULTS[code] ?? ACTIONABLE_ERROR_DEFAULTS.UNKNOWN;
  return {
    retryable: defaults.retryable,
    fixHint: defaults.fixHint
  };
}

export class DeployError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'DeployError';
    this.code = code;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asDeployError(value: unknown): DeployError {
  if (value instanceof DeployError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError') {
    return new DeployError('TIMEOUT', err.message, { cause: err });
  }

  return new DeployError('INTERNAL', err.message, { cause: err });
}
