import * as Pulumi from "@pulumi/pulumi";
import { describeError } from "./provision-logger.js";
import type { ProvisionLogger } from "./provision-logger.js";


/**
 * Writes to the Pulumi engine log, so events show up in the output of
 * `pulumi up` alongside the resource diff.
 */
export class EngineProvisionLogger implements ProvisionLogger
{
    public logInfo(message: string): void
    {
        Pulumi.log.info(message);
    }
    
    public logError(message: string, error: unknown): void
    {
        Pulumi.log.error(`${message}: ${describeError(error)}`);
    }
}
