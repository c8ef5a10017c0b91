import { BaseError } from "./base.error";
import { CongestionErrorCodes } from "./congestion.codes";


/**
 * Errors raised by the congestion controller itself
 */
export class CongestionError extends BaseError {

    private errorCode: CongestionErrorCodes;

    constructor (errorCode: CongestionErrorCodes, msg?: string) {
        super( "" + CongestionErrorCodes[errorCode] + " : " + msg);
        this.errorCode = errorCode;
    }

    public getErrorCode(): CongestionErrorCodes {
        return this.errorCode;
    }
}
