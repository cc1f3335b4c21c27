export type ResponseStatus = 'success' | 'error';

export interface ArbitrageRequest {
  strategy_id: string;
  symbol: string;
  primary_exchange: string;
  secondary_exchange: string;
  amount: number;
  /** Advisory only; requests are not reordered by priority. */
  priority: number;
  timestamp: string;
}

export interface SuccessResponse {
  status: 'success';
  profit: number;
  execution_time: string;
  gas_used?: number;
}

export interface ErrorResponse {
  status: 'error';
  execution_time: string;
  error_message: string;
}

export type ArbitrageResponse = SuccessResponse | ErrorResponse;

export interface RateObservation {
  exchange: string;
  symbol: string;
  rate: number;
  observedAt: number;
}

export interface ExecutionReport {
  strategyId: string;
  symbol: string;
  primaryExchange: string;
  secondaryExchange: string;
  success: boolean;
  profit?: number;
  errorCode?: string;
  message?: string;
  durationMs: number;
  timestamp: number;
}

export interface ConnectionEvent {
  connectionId: string;
  remoteAddress: string;
  timestamp: number;
}

export interface MetricsSnapshot {
  requests: number;
  successes: number;
  failures: number;
  profit: number;
  rateLookups: number;
  openConnections: number;
  timestamp: number;
}
