import { Constants } from "../utilities/constants";
import { Clock, MonotonicClock, Time } from "../utilities/time";
import { SerialArithmetic } from "../helpers/serial.arithmetic";
import { VerboseLogging } from "../utilities/logging/verbose.logging";
import { CongestionError } from "../utilities/errors/congestion.error";
import { CongestionErrorCodes } from "../utilities/errors/congestion.codes";
import { ProbeSample } from "./probe.sample";
import { CongestionObserver, LoggingCongestionObserver, WindowAction } from "./congestion.observer";


export interface CongestionControllerOptions {
    clock?: Clock;
    observer?: CongestionObserver;
    /**
     * Window to start with and to fall back to after an idle period. Defaults to Constants.INITIAL_WINDOW
     */
    initialWindow?: number;
    verifyInvariants?: boolean;
}

/**
 * Congestion control for a reliable, ordered byte stream, modelled on TCP congestion control (RFC 5681)
 * with the TCP Vegas algorithm on top.
 *
 * The transport never loses data, so the only congestion signal is queuing delay, which we observe through
 * application-level probe/response round trips. Those measurements are coarse and indirect,
 * hence the amount of interpolation in the estimates below.
 *
 * The owning connection must call:
 *  - recordProgress() whenever it hands bytes to the transport
 *  - probeSent() right before it writes a probe
 *  - probeAcked() as soon as the matching response comes in
 * all on the same thread of control. None of the methods block.
 */
export class CongestionController {

    /////////////////////////////////
    // IMPLEMENTATION VARIABLES
    ////////////////////////////////
    private clock: Clock;
    private observer: CongestionObserver;
    private initialWindow: number;
    private verifyInvariants: boolean;

    /////////////////////////////////
    // CONGESTION VARIABLES
    ////////////////////////////////
    /**
     * Last reported byte position (modulo 2^32)
     */
    private lastPosition: number;
    /**
     * Bytes believed to sit in output buffers beyond the bandwidth-delay product
     */
    private extraBuffer: number;
    /**
     * Lowest RTT ever observed, our estimate of the wire latency. undefined until measured
     */
    private baseRTT?: number;
    private congestionWindow: number;
    /**
     * Samples collected since the last window adjustment
     */
    private sampleCount: number;
    private minRTT?: number;
    private minCongestedRTT?: number;

    private lastUpdateTime: number;
    private lastSentTime: number;
    private lastAdjustmentTime: number;
    private lastResponseArrival: number;
    /**
     * Most recently answered probe, anchor for the interpolations
     */
    private lastResponse: ProbeSample;
    /**
     * Probes without a response yet, oldest first. Responses arrive in send order.
     */
    private pendingProbes: ProbeSample[];


    public constructor(options: CongestionControllerOptions = {}) {
        let initialWindow = options.initialWindow !== undefined ? options.initialWindow : Constants.INITIAL_WINDOW;
        if (!Number.isInteger(initialWindow) || initialWindow < Constants.MINIMUM_WINDOW || initialWindow > Constants.MAXIMUM_WINDOW) {
            throw new CongestionError(CongestionErrorCodes.INVALID_OPTION, "initialWindow must be an integer in [" + Constants.MINIMUM_WINDOW + ", " + Constants.MAXIMUM_WINDOW + "], got " + initialWindow);
        }

        this.clock = options.clock !== undefined ? options.clock : new MonotonicClock();
        this.observer = options.observer !== undefined ? options.observer : new LoggingCongestionObserver();
        this.initialWindow = initialWindow;
        this.verifyInvariants = options.verifyInvariants !== undefined ? options.verifyInvariants : Constants.DEBUG_verifyInvariants;

        let now = this.clock.now();
        this.lastPosition = 0;
        this.extraBuffer = 0;
        this.baseRTT = undefined;
        this.congestionWindow = initialWindow;
        this.sampleCount = 0;
        this.minRTT = undefined;
        this.minCongestedRTT = undefined;
        this.lastUpdateTime = now;
        this.lastSentTime = now;
        this.lastAdjustmentTime = now;
        this.lastResponseArrival = now;
        this.lastResponse = { sentAt: now, positionAtSend: 0, extraAtSend: 0, wasCongested: false };
        this.pendingProbes = [];
    }

    /**
     * Update the byte position, called whenever data is handed to the transport
     * @param position cumulative number of bytes written, reduced modulo 2^32
     */
    public recordProgress(position: number): void {
        let now = this.clock.now();
        let pos = SerialArithmetic.toUint32(position);
        let delta = SerialArithmetic.distance(pos, this.lastPosition);

        if (delta > 0 || this.extraBuffer > 0)
            this.lastSentTime = now;

        // Idle for too long? This is a very crude RTO, not a full RFC 2861 restart
        let idleTime = Time.msBetween(this.lastSentTime, now);
        let idleTimeout = this.baseRTT === undefined ? Constants.IDLE_TIMEOUT_FLOOR : Math.max(this.baseRTT * 2, Constants.IDLE_TIMEOUT_FLOOR);
        if (idleTime > idleTimeout) {
            this.resetAfterIdle(idleTime, now);
        }

        // Most of the time we are overbuffering. Track how much, so the delay it causes can be
        // separated from the delay caused by a wrong congestion window (needs a wire latency first)
        if (this.baseRTT !== undefined) {
            this.extraBuffer += delta;
            let consumed = Math.floor(Time.msBetween(this.lastUpdateTime, now) * this.congestionWindow / this.baseRTT);
            this.extraBuffer = Math.max(0, this.extraBuffer - consumed);
        }

        this.lastPosition = pos;
        this.lastUpdateTime = now;
    }

    /**
     * Register a probe, called right before the probe message is written
     */
    public probeSent(): void {
        let sample: ProbeSample = {
            sentAt: this.clock.now(),
            positionAtSend: this.lastPosition,
            extraAtSend: this.extraBufferEstimate(),
            wasCongested: this.isCongested()
        };
        this.pendingProbes.push(sample);

        if (this.pendingProbes.length % Constants.PENDING_PROBES_WARN_THRESHOLD === 0) {
            this.observer.onProbeBacklog(this.pendingProbes.length);
        }
    }

    /**
     * Match the oldest pending probe with a response that just arrived
     */
    public probeAcked(): void {
        let sample = this.pendingProbes.shift();
        if (sample === undefined) {
            VerboseLogging.debug("CongestionController:probeAcked : response without a pending probe, ignoring");
            return;
        }

        let now = this.clock.now();
        this.lastResponse = sample;
        this.lastResponseArrival = now;

        let rtt = Math.max(1, Time.msBetween(sample.sentAt, now));

        // the lowest latency we ever see is our estimate of the wire latency
        let baseRTT = this.baseRTT === undefined ? rtt : Math.min(this.baseRTT, rtt);
        this.baseRTT = baseRTT;

        // probes sent before the last adjustment did not measure the current window
        if (sample.sentAt < this.lastAdjustmentTime)
            return;

        // remove the delay the probe spent behind our own overbuffering
        let delay = this.bufferDelay(sample.extraAtSend, baseRTT);
        rtt = delay < rtt ? rtt - delay : 1;

        // below the wire latency means we underestimated the buffering. We can't tell
        // by how much, so pretend there was no buffering delay at all
        rtt = Math.max(rtt, baseRTT);

        // Delay based, so every sample counts, not only the ones limited by the window.
        // Otherwise rising congestion would go unnoticed until the application fills the window
        this.minRTT = this.minRTT === undefined ? rtt : Math.min(this.minRTT, rtt);
        if (sample.wasCongested)
            this.minCongestedRTT = this.minCongestedRTT === undefined ? rtt : Math.min(this.minCongestedRTT, rtt);

        this.sampleCount++;
        this.adjustWindow(now, baseRTT, this.minRTT);
    }

    public isCongested(): boolean {
        return this.inFlightEstimate() >= this.congestionWindow;
    }

    /**
     * Bytes handed to the transport that the peer has likely not processed yet
     */
    public inFlightEstimate(): number {
        if (this.lastPosition === this.lastResponse.positionAtSend)
            return 0;

        let next: ProbeSample | undefined = this.pendingProbes[0];

        if (this.baseRTT === undefined) {
            if (next !== undefined)
                return SerialArithmetic.distance(this.lastPosition, next.positionAtSend);
            return 0;
        }

        let now = this.clock.now();
        let acked: number;

        if (next !== undefined) {
            // another response is on its way, interpolate between the last one and that one
            let etaNext = this.compensatedInterval(this.lastResponse, next.sentAt, next.extraAtSend, this.baseRTT);
            let elapsed = Time.msBetween(this.lastResponseArrival, now);

            // should be here any moment now, be optimistic
            if (etaNext <= elapsed) {
                acked = next.positionAtSend;
            } else {
                let span = SerialArithmetic.distance(next.positionAtSend, this.lastResponse.positionAtSend);
                acked = SerialArithmetic.toUint32(this.lastResponse.positionAtSend + Math.floor(span * elapsed / etaNext));
            }
        } else {
            // nothing to wait for, guess from the time since the last position update
            let elapsed = Time.msBetween(this.lastUpdateTime, now);
            let drained = elapsed <= this.baseRTT ? 0 : Math.floor((elapsed - this.baseRTT) * this.congestionWindow / this.baseRTT);
            drained = Math.min(drained, this.extraBuffer);
            acked = SerialArithmetic.toUint32(this.lastPosition - this.extraBuffer + drained);
        }

        return SerialArithmetic.distance(this.lastPosition, acked);
    }

    /**
     * Current overbuffering estimate, decayed for the time since the last position update
     */
    public extraBufferEstimate(): number {
        if (this.baseRTT === undefined)
            return 0;

        let consumed = Math.floor(Time.msBetween(this.lastUpdateTime, this.clock.now()) * this.congestionWindow / this.baseRTT);
        return consumed >= this.extraBuffer ? 0 : this.extraBuffer - consumed;
    }

    public extraBufferEstimateNow(): number {
        return this.extraBufferEstimate();
    }

    /**
     * Milliseconds until enough data is acknowledged to leave the congested state.
     * undefined when there are no measurements yet
     */
    public etaUntilUncongested(): number | undefined {
        let targetAcked = SerialArithmetic.toUint32(this.lastPosition - this.congestionWindow);

        if (SerialArithmetic.isAfter(this.lastResponse.positionAtSend, targetAcked))
            return 0;

        if (this.baseRTT === undefined)
            return undefined;

        let elapsed = Time.msBetween(this.lastResponseArrival, this.clock.now());
        let previous = this.lastResponse;
        let eta = 0;

        // walk the queue to find the response that gets us uncongested
        for (let probe of this.pendingProbes) {
            let etaNext = this.compensatedInterval(previous, probe.sentAt, probe.extraAtSend, this.baseRTT);

            if (SerialArithmetic.isAfter(probe.positionAtSend, targetAcked)) {
                eta += Math.floor(etaNext * SerialArithmetic.distance(probe.positionAtSend, targetAcked) / SerialArithmetic.distance(probe.positionAtSend, previous.positionAtSend));
                return elapsed > eta ? 0 : eta - elapsed;
            }

            eta += etaNext;
            previous = probe;
        }

        // No pending response clears it. Pretend a probe went out right after the last position update
        let lastInterval = this.compensatedInterval(previous, this.lastUpdateTime, this.extraBuffer, this.baseRTT);
        eta += Math.floor(lastInterval * SerialArithmetic.distance(this.lastPosition, targetAcked) / SerialArithmetic.distance(this.lastPosition, previous.positionAtSend));
        return elapsed > eta ? 0 : eta - elapsed;
    }

    public getCongestionWindow(): number {
        return this.congestionWindow;
    }

    public getBaseRTT(): number | undefined {
        return this.baseRTT;
    }

    public getPendingProbeCount(): number {
        return this.pendingProbes.length;
    }

    /**
     * Vegas step. The goal is a slightly too large window, since a perfect one can't be told apart
     * from a too small one. That means aiming for a few ms of extra delay.
     */
    private adjustWindow(now: number, baseRTT: number, minRTT: number): void {
        // at least three samples, to keep the noise down
        if (this.sampleCount < Constants.MIN_SAMPLES_PER_ADJUSTMENT)
            return;

        this.checkInvariant(minRTT >= baseRTT, "minRTT " + minRTT + " below baseRTT " + baseRTT);
        this.checkInvariant(this.minCongestedRTT === undefined || this.minCongestedRTT >= baseRTT, "minCongestedRTT " + this.minCongestedRTT + " below baseRTT " + baseRTT);

        let previousWindow = this.congestionWindow;
        let action = WindowAction.HOLD;

        // first make sure the window isn't too large, using all samples
        let diff = minRTT - baseRTT;
        if (diff > Constants.WAY_TOO_LARGE_DELAY) {
            this.congestionWindow = Math.floor(this.congestionWindow * baseRTT / minRTT);
            action = WindowAction.SHRINK_MULTIPLICATIVE;
        } else if (diff > Constants.TOO_LARGE_DELAY) {
            this.congestionWindow -= Constants.WINDOW_DECREMENT;
            action = WindowAction.SHRINK;
        } else if (this.minCongestedRTT !== undefined) {
            // only samples limited by the window say anything about it being too small
            diff = this.minCongestedRTT - baseRTT;
            if (diff < Constants.WAY_TOO_SMALL_DELAY) {
                this.congestionWindow += Constants.WINDOW_FAST_INCREMENT;
                action = WindowAction.GROW_FAST;
            } else if (diff < Constants.TOO_SMALL_DELAY) {
                this.congestionWindow += Constants.WINDOW_INCREMENT;
                action = WindowAction.GROW;
            }
        }

        this.congestionWindow = Math.min(Constants.MAXIMUM_WINDOW, Math.max(Constants.MINIMUM_WINDOW, this.congestionWindow));

        this.observer.onWindowAdjusted({
            action: action,
            previousWindow: previousWindow,
            congestionWindow: this.congestionWindow,
            baseRTT: baseRTT,
            minRTT: minRTT,
            minCongestedRTT: this.minCongestedRTT
        });

        this.sampleCount = 0;
        this.lastAdjustmentTime = now;
        this.minRTT = this.minCongestedRTT = undefined;
    }

    /**
     * Close the window and redo the wire latency measurement
     */
    private resetAfterIdle(idleTime: number, now: number): void {
        let previousWindow = this.congestionWindow;

        this.congestionWindow = Math.min(this.initialWindow, this.congestionWindow);
        this.baseRTT = undefined;
        this.sampleCount = 0;
        this.lastAdjustmentTime = now;
        this.minRTT = this.minCongestedRTT = undefined;

        this.observer.onIdleReset({
            idleTime: idleTime,
            previousWindow: previousWindow,
            congestionWindow: this.congestionWindow
        });
    }

    /**
     * Time a probe spends queued behind extraBytes of overbuffering
     */
    private bufferDelay(extraBytes: number, baseRTT: number): number {
        return Math.floor(extraBytes * baseRTT / this.congestionWindow);
    }

    /**
     * Expected time between the response to 'from' and a response to something sent at 'toSentAt',
     * compensated for the buffering delay at both ends
     */
    private compensatedInterval(from: ProbeSample, toSentAt: number, toExtra: number, baseRTT: number): number {
        let interval = Time.msBetween(from.sentAt, toSentAt) + this.bufferDelay(toExtra, baseRTT);
        let delay = this.bufferDelay(from.extraAtSend, baseRTT);
        return delay >= interval ? 0 : interval - delay;
    }

    private checkInvariant(condition: boolean, message: string): void {
        if (this.verifyInvariants && !condition) {
            throw new CongestionError(CongestionErrorCodes.INVARIANT_VIOLATION, message);
        }
    }
}
