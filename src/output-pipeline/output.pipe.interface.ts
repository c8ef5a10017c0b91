import { VerboseLogging } from "../utilities/logging/verbose.logging";


export abstract class OutputPipe{
    /**
     * this function will send the data to the next pipeline element
     * takes one Buffer as argument
     */
    public nextPipeFunc : (data: Buffer) => void;

    constructor(){
        this.nextPipeFunc = function(data : Buffer){VerboseLogging.error("Calling non-existing pipe function, dropping " + data.byteLength + " bytes")}
    }


    /**
     * data comes in here from the previous element in the pipeline, or start of pipeline
     * @param data 
     */
    public abstract dataIn(data : Buffer) : void;

    public setNextPipeFunc(func : (data: Buffer) => void) : void{
        this.nextPipeFunc = func;
    }
}
