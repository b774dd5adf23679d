/**
 * CLI option shapes
 */

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  /** Overrides RELAY_OUTPUT_DIR */
  outputDir?: string;
  /** Overrides RELAY_LOCAL_AET */
  aet?: string;
}

export interface RelayCommandOptions {
  once?: boolean;
  interval?: string;
  ledger?: string;
}

export interface ReceiveCommandOptions {
  port?: string;
}

export interface SendCommandOptions {
  to: string;
  calledAet: string;
}

export interface EchoCommandOptions {
  calledAet: string;
}
