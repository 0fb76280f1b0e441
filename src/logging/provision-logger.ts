export interface ProvisionLogger
{
    logInfo(message: string): void;
    logError(message: string, error: unknown): void;
}


export function describeError(error: unknown): string
{
    if (error instanceof Error)
        return error.message;
    
    return String(error);
}
