import { ILogger } from "./interfaces/ILogger";
import { SecretRedactor } from "./utils/SecretRedactor";

function describeError(error: unknown): string {
    if (typeof error === "string") return error;
    if (error instanceof Error) return error.message;
    return JSON.stringify(error);
}

export class ConsoleLogger implements ILogger {
    log(message: string): void {
        console.log(SecretRedactor.redact(message));
    }

    warn(message: string, error?: unknown): void {
        const redactedMessage = SecretRedactor.redact(message);
        if (error !== undefined) {
            console.warn(redactedMessage, SecretRedactor.redact(describeError(error)));
        } else {
            console.warn(redactedMessage);
        }
    }

    error(message: string, error?: unknown): void {
        const redactedMessage = SecretRedactor.redact(message);
        if (error !== undefined) {
            console.error(redactedMessage, SecretRedactor.redact(describeError(error)));
        } else {
            console.error(redactedMessage);
        }
    }
}
