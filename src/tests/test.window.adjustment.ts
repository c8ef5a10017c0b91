import { CongestionController } from '../congestion-control/congestion.controller';
import { WindowAction } from '../congestion-control/congestion.observer';
import { Constants } from '../utilities/constants';
import { ManualClock, RecordingObserver, expectEqual, roundTrip, measureWireLatency, burstRoundTrip } from './test.helpers';

export class TestWindowAdjustment {

    public static execute(): boolean {
        let results = [
            TestWindowAdjustment.testNeedsThreeSamples(),
            TestWindowAdjustment.testWayTooLarge(),
            TestWindowAdjustment.testSlightlyTooLarge(),
            TestWindowAdjustment.testStarvation(Constants.MINIMUM_WINDOW, Constants.MINIMUM_WINDOW + Constants.WINDOW_FAST_INCREMENT),
            // growing past the maximum gets clamped back
            TestWindowAdjustment.testStarvation(Constants.MAXIMUM_WINDOW - 4096, Constants.MAXIMUM_WINDOW),
            TestWindowAdjustment.testSlightlyTooSmall(),
            TestWindowAdjustment.testStaleSamplesIgnored(),
            TestWindowAdjustment.testSpuriousResponse()
        ];

        return results.every((result) => result);
    }

    private static testNeedsThreeSamples(): boolean {
        let clock = new ManualClock();
        let observer = new RecordingObserver();
        let controller = new CongestionController({ clock: clock, observer: observer });

        roundTrip(controller, clock, 20);
        roundTrip(controller, clock, 20);
        if (!expectEqual("needsThreeSamples: adjustments after 2 samples", observer.adjustments.length, 0))
            return false;

        roundTrip(controller, clock, 20);
        if (!expectEqual("needsThreeSamples: adjustments after 3 samples", observer.adjustments.length, 1))
            return false;

        // nothing congested and no extra delay: leave the window alone
        let adjustment = observer.adjustments[0];
        return expectEqual("needsThreeSamples: action", adjustment.action, WindowAction.HOLD) &&
               expectEqual("needsThreeSamples: minCongestedRTT", adjustment.minCongestedRTT, undefined) &&
               expectEqual("needsThreeSamples: window", controller.getCongestionWindow(), Constants.INITIAL_WINDOW);
    }

    private static testWayTooLarge(): boolean {
        let clock = new ManualClock();
        let observer = new RecordingObserver();
        let controller = new CongestionController({ clock: clock, observer: observer, initialWindow: 1048576 });

        measureWireLatency(controller, clock, 20);
        roundTrip(controller, clock, 200);
        roundTrip(controller, clock, 200);
        roundTrip(controller, clock, 200);

        let adjustment = observer.adjustments[1];
        return expectEqual("wayTooLarge: adjustments", observer.adjustments.length, 2) &&
               expectEqual("wayTooLarge: action", adjustment.action, WindowAction.SHRINK_MULTIPLICATIVE) &&
               expectEqual("wayTooLarge: minRTT", adjustment.minRTT, 200) &&
               expectEqual("wayTooLarge: baseRTT", adjustment.baseRTT, 20) &&
               // 1048576 * 20 / 200
               expectEqual("wayTooLarge: window", controller.getCongestionWindow(), 104857);
    }

    private static testSlightlyTooLarge(): boolean {
        let clock = new ManualClock();
        let observer = new RecordingObserver();
        let controller = new CongestionController({ clock: clock, observer: observer });

        measureWireLatency(controller, clock, 20);
        roundTrip(controller, clock, 90);
        roundTrip(controller, clock, 90);
        roundTrip(controller, clock, 90);

        return expectEqual("slightlyTooLarge: action", observer.adjustments[1].action, WindowAction.SHRINK) &&
               expectEqual("slightlyTooLarge: window", controller.getCongestionWindow(), 12288);
    }

    private static testStarvation(window: number, expectedWindow: number): boolean {
        let clock = new ManualClock();
        let observer = new RecordingObserver();
        let controller = new CongestionController({ clock: clock, observer: observer, initialWindow: window });

        measureWireLatency(controller, clock, 20);
        controller.recordProgress(0);

        // every burst is four windows, so each probe goes out congested
        burstRoundTrip(controller, clock, 4 * window, 20);
        burstRoundTrip(controller, clock, 8 * window, 20);
        burstRoundTrip(controller, clock, 12 * window, 20);

        let adjustment = observer.adjustments[1];
        return expectEqual("starvation(" + window + "): adjustments", observer.adjustments.length, 2) &&
               expectEqual("starvation(" + window + "): action", adjustment.action, WindowAction.GROW_FAST) &&
               expectEqual("starvation(" + window + "): minCongestedRTT", adjustment.minCongestedRTT, 20) &&
               expectEqual("starvation(" + window + "): previous window", adjustment.previousWindow, window) &&
               expectEqual("starvation(" + window + "): window", controller.getCongestionWindow(), expectedWindow);
    }

    private static testSlightlyTooSmall(): boolean {
        let clock = new ManualClock();
        let observer = new RecordingObserver();
        let controller = new CongestionController({ clock: clock, observer: observer });
        let window = Constants.INITIAL_WINDOW;

        measureWireLatency(controller, clock, 20);
        controller.recordProgress(0);

        // raw RTTs minus the buffering delay at send time (80, 50, 50 ms) leave 30 ms each
        burstRoundTrip(controller, clock, 4 * window, 110);
        burstRoundTrip(controller, clock, 8 * window, 80);
        burstRoundTrip(controller, clock, 12 * window, 80);

        let adjustment = observer.adjustments[1];
        return expectEqual("slightlyTooSmall: minRTT", adjustment.minRTT, 30) &&
               expectEqual("slightlyTooSmall: minCongestedRTT", adjustment.minCongestedRTT, 30) &&
               expectEqual("slightlyTooSmall: action", adjustment.action, WindowAction.GROW) &&
               expectEqual("slightlyTooSmall: window", controller.getCongestionWindow(), 20480);
    }

    private static testStaleSamplesIgnored(): boolean {
        let clock = new ManualClock();
        let observer = new RecordingObserver();
        let controller = new CongestionController({ clock: clock, observer: observer });

        roundTrip(controller, clock, 30);
        roundTrip(controller, clock, 30);
        controller.probeSent();
        clock.advance(20);
        // sent before the adjustment that the previous probe is about to trigger
        controller.probeSent();
        clock.advance(10);
        controller.probeAcked();
        if (!expectEqual("staleSamples: first adjustment", observer.adjustments.length, 1))
            return false;

        clock.advance(5);
        controller.probeAcked();
        // stale, but it still lowers the wire latency floor
        if (!expectEqual("staleSamples: baseRTT", controller.getBaseRTT(), 15))
            return false;

        roundTrip(controller, clock, 15);
        roundTrip(controller, clock, 15);
        if (!expectEqual("staleSamples: stale sample counted", observer.adjustments.length, 1))
            return false;

        roundTrip(controller, clock, 15);
        return expectEqual("staleSamples: second adjustment", observer.adjustments.length, 2) &&
               expectEqual("staleSamples: pending", controller.getPendingProbeCount(), 0);
    }

    private static testSpuriousResponse(): boolean {
        let clock = new ManualClock();
        let observer = new RecordingObserver();
        let controller = new CongestionController({ clock: clock, observer: observer });

        clock.advance(20);
        controller.probeAcked();

        return expectEqual("spuriousResponse: baseRTT", controller.getBaseRTT(), undefined) &&
               expectEqual("spuriousResponse: pending", controller.getPendingProbeCount(), 0) &&
               expectEqual("spuriousResponse: adjustments", observer.adjustments.length, 0);
    }
}
