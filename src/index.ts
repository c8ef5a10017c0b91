export { CongestionController } from "./congestion-control/congestion.controller";
export type { CongestionControllerOptions } from "./congestion-control/congestion.controller";
export type { ProbeSample } from "./congestion-control/probe.sample";
export { LoggingCongestionObserver, WindowAction } from "./congestion-control/congestion.observer";
export type { CongestionObserver, WindowAdjustment, IdleReset } from "./congestion-control/congestion.observer";
export { CongestionGate } from "./output-pipeline/congestion.gate";
export { OutputPipe } from "./output-pipeline/output.pipe.interface";
export { SerialArithmetic } from "./helpers/serial.arithmetic";
export { MonotonicClock, Time } from "./utilities/time";
export type { Clock } from "./utilities/time";
export { Constants } from "./utilities/constants";
export { CongestionError } from "./utilities/errors/congestion.error";
export { CongestionErrorCodes } from "./utilities/errors/congestion.codes";
export { BaseError } from "./utilities/errors/base.error";
export { VerboseLogging } from "./utilities/logging/verbose.logging";
