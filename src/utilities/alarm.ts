import { EventEmitter } from "events";
import { clearTimeout } from "timers";
import { EventConstants } from "./event.constants";


export class Alarm extends EventEmitter {

    private timer?: NodeJS.Timeout;
    private running: boolean;

    public constructor() {
        super();
        this.running = false;
    }

    public reset() {
        if (this.timer !== undefined)
            clearTimeout(this.timer);
        this.timer = undefined;
        this.removeAllListeners();
        this.running = false;
    }

    public start(timeInMs: number) {
        this.running = true;
        this.timer = global.setTimeout(() => {
            this.onTimeout();
        }, timeInMs);
    }

    private onTimeout() {
        this.running = false;
        this.timer = undefined;
        this.emit(EventConstants.ALARM_TIMEOUT);
    }

    public isRunning(): boolean {
        return this.running;
    }
}
