import { EventEmitter } from 'eventemitter3';
import {
  ConnectionEvent,
  ExecutionReport,
  MetricsSnapshot,
  RateObservation
} from '../core/types.js';

export type EventBusEvents = {
  rate: (observation: RateObservation) => void;
  execution: (report: ExecutionReport) => void;
  connectionOpened: (event: ConnectionEvent) => void;
  connectionClosed: (event: ConnectionEvent) => void;
  metrics: (snapshot: MetricsSnapshot) => void;
};

export class EventBus extends EventEmitter<EventBusEvents> {}

export const eventBus = new EventBus();
