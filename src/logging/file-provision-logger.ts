import { given } from "@nivinjoseph/n-defensive";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { EngineProvisionLogger } from "./engine-provision-logger.js";
import { describeError } from "./provision-logger.js";
import type { ProvisionLogger } from "./provision-logger.js";


/**
 * Appends one line per event to a log file:
 * `<ISO-8601 timestamp> - <LEVEL> - <message>`.
 * 
 * Every event is also handed to `forwardTo`, when given. A failed write is
 * reported to `forwardTo` (or the engine log) instead of thrown.
 */
export class FileProvisionLogger implements ProvisionLogger
{
    private readonly _filePath: string;
    private readonly _forwardTo: ProvisionLogger | null;
    
    
    public get filePath(): string { return this._filePath; }
    
    
    public constructor(filePath: string, forwardTo?: ProvisionLogger)
    {
        given(filePath, "filePath").ensureHasValue().ensureIsString()
            .ensure(t => t.trim().length > 0, "filePath cannot be blank");
        this._filePath = resolve(filePath.trim());
        
        this._forwardTo = forwardTo ?? null;
        
        mkdirSync(dirname(this._filePath), { recursive: true });
    }
    
    
    public logInfo(message: string): void
    {
        this._write("INFO", message);
        this._forwardTo?.logInfo(message);
    }
    
    public logError(message: string, error: unknown): void
    {
        this._write("ERROR", `${message}: ${describeError(error)}`);
        this._forwardTo?.logError(message, error);
    }
    
    private _write(level: "INFO" | "ERROR", message: string): void
    {
        try
        {
            appendFileSync(this._filePath, `${new Date().toISOString()} - ${level} - ${message}\n`, "utf8");
        }
        catch (e)
        {
            (this._forwardTo ?? new EngineProvisionLogger()).logError(`Failed to write log file ${this._filePath}`, e);
        }
    }
}
