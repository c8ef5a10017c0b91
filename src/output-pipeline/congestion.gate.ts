import { OutputPipe } from "./output.pipe.interface";
import { CongestionController } from "../congestion-control/congestion.controller";
import { SerialArithmetic } from "../helpers/serial.arithmetic";
import { Alarm } from "../utilities/alarm";
import { EventConstants } from "../utilities/event.constants";
import { Constants } from "../utilities/constants";
import { VerboseLogging } from "../utilities/logging/verbose.logging";


/**
 * Pipeline stage that holds outgoing data back while the congestion controller says we're congested.
 * Every flush that lets data through is followed by a round-trip probe; the transport writes the actual
 * probe message through probeFunc and reports the response with probeResponseIn().
 */
export class CongestionGate extends OutputPipe {

    private controller: CongestionController;
    private probeFunc: () => void;
    private queue: Buffer[];
    private queuedBytes: number;
    /**
     * Total bytes passed downstream, modulo 2^32
     */
    private position: number;
    private retryAlarm: Alarm;

    public constructor(controller: CongestionController, probeFunc: () => void) {
        super();
        this.controller = controller;
        this.probeFunc = probeFunc;
        this.queue = [];
        this.queuedBytes = 0;
        this.position = 0;
        this.retryAlarm = new Alarm();
    }

    public dataIn(data: Buffer): void {
        this.queue.push(data);
        this.queuedBytes += data.byteLength;
        this.flush();
    }

    /**
     * The peer answered our oldest outstanding probe
     */
    public probeResponseIn(): void {
        this.controller.probeAcked();
        this.flush();
    }

    public getQueuedBytes(): number {
        return this.queuedBytes;
    }

    public getPosition(): number {
        return this.position;
    }

    public close(): void {
        this.retryAlarm.reset();
    }

    private flush(): void {
        // refresh the estimates before asking for the congestion state
        this.controller.recordProgress(this.position);

        let sent = false;
        while (this.queue.length > 0 && !this.controller.isCongested()) {
            let data = this.queue.shift();
            if (data === undefined)
                break;

            this.queuedBytes -= data.byteLength;
            this.position = SerialArithmetic.toUint32(this.position + data.byteLength);
            this.nextPipeFunc(data);
            this.controller.recordProgress(this.position);
            sent = true;
        }

        if (sent) {
            this.controller.probeSent();
            this.probeFunc();
        }

        if (this.queue.length > 0)
            this.scheduleRetry();
        else if (this.retryAlarm.isRunning())
            this.retryAlarm.reset();
    }

    private scheduleRetry(): void {
        if (this.retryAlarm.isRunning())
            return;

        let eta = this.controller.etaUntilUncongested();
        let delay = eta === undefined ? Constants.CONGESTION_RETRY_INTERVAL : Math.max(1, eta);

        VerboseLogging.trace("CongestionGate:scheduleRetry : congested with " + this.queuedBytes + " bytes queued, retrying in " + delay + " ms");

        this.retryAlarm.on(EventConstants.ALARM_TIMEOUT, () => {
            this.retryAlarm.reset();
            this.flush();
        });
        this.retryAlarm.start(delay);
    }
}
