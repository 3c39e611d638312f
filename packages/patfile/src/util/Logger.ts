/** Where codec and file warnings go.  Pass your own to collect or silence them. */
export interface Logger {
    info(message: string): void;
    warn(message: string): void;
}

export const consoleLogger: Logger = {
    info: (message) => console.log(message),
    warn: (message) => console.warn(message),
};
