import { Constants } from '../constants';
import { Configuration, Logger, configure, getLogger } from 'log4js';


export class VerboseLogging{
    private static logger: VerboseLogging;
    private output: Logger;

    public static getInstance(): VerboseLogging {
        if (this.logger === undefined) {
            this.logger = new VerboseLogging();
        }
        return this.logger;
    }

    public static getInternalLogger():Logger {
        return VerboseLogging.getInstance().output;
    }

    public static trace(message:string){
        VerboseLogging.getInstance().output.trace(message);
    }

    public static debug(message:string){
        VerboseLogging.getInstance().output.debug(message);
    }

    public static info(message:string){
        VerboseLogging.getInstance().output.info(message);
    }

    public static warn(message:string){
        VerboseLogging.getInstance().output.warn(message);
    }

    public static error(message:string){
        VerboseLogging.getInstance().output.error(message);
    }

    public static fatal(message:string){
        VerboseLogging.getInstance().output.fatal(message);
    }

    public static isDebugEnabled(): boolean {
        return VerboseLogging.getInstance().output.isDebugEnabled();
    }

    private constructor() {
        let appenders: string[] = [];
        let config: Configuration = {
            appenders: {
                consoleOut: {
                    type: Constants.LOG_TYPE
                }
            },
            categories: {
                default: {
                    appenders: appenders,
                    level: Constants.LOG_LEVEL
                }
            }
        };

        if( !process.env.DISABLE_STDOUT || (process.env.DISABLE_STDOUT === "false") )
            appenders.push('consoleOut');

        if( Constants.LOG_FILE_NAME !== undefined ){
            config.appenders.fileOut = {
                type: "file",
                filename: './logs/' + Constants.LOG_FILE_NAME,
                maxLogSize: Constants.MAX_LOG_FILE_SIZE,
                layout: { type: 'basic' }
            };
            appenders.push('fileOut');
        }

        // log4js refuses a category without appenders
        if( appenders.length === 0 ){
            config.appenders.silent = { type: "logLevelFilter", appender: "consoleOut", level: "off" };
            appenders.push('silent');
        }

        configure(config);

        this.output = getLogger();
        this.output.level = Constants.LOG_LEVEL;
    }
}
