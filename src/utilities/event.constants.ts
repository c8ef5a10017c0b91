export class EventConstants {

    public static readonly ALARM_TIMEOUT = "alarm-timeout";
}
