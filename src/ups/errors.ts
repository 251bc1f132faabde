import type { UpsErrorCode, UpsErrorInfo } from '../types.js';

export class UpsError extends Error {
  public readonly code: UpsErrorCode;
  public readonly detail?: string;

  constructor(error: UpsErrorInfo) {
    super(error.message);
    this.name = 'UpsError';
    this.code = error.code;
    this.detail = error.detail;
  }

  toJSON(): UpsErrorInfo {
    return {
      code: this.code,
      message: this.message,
      detail: this.detail,
    };
  }
}

export function configurationError(message: string, detail?: string): UpsError {
  return new UpsError({ code: 'CONFIGURATION', message, detail });
}

export function resolutionError(hostname: string, detail?: string): UpsError {
  return new UpsError({ code: 'RESOLUTION', message: `Can't resolve: ${hostname}`, detail });
}

export function transportError(detail?: string): UpsError {
  return new UpsError({ code: 'TRANSPORT', message: 'Unable to SNMP.', detail });
}

export function queryError(detail?: string): UpsError {
  return new UpsError({ code: 'QUERY', message: 'Unable to fetch UPS parameters.', detail });
}
