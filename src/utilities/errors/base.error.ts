/**
 * Root of the error hierarchy: keeps the subclass name and a stack starting at the throw site
 */
export class BaseError extends Error {
    constructor(msg?: string) {
        super(msg);
        this.name = new.target.name;
        Error.captureStackTrace(this, new.target);
    }
}
