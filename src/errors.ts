export class JdsortError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Fatal before any file is touched
export class ConfigurationError extends JdsortError {}

export class InvalidFormatTemplate extends ConfigurationError {
    constructor(readonly template: string, readonly codes: string[]) {
        super(`Invalid date format "${template}": unsupported code(s) ${codes.join(', ')}`);
    }
}

export class LookupError extends JdsortError {}

export class InvalidProjectPath extends LookupError {
    constructor(readonly projectPath: string, reason: string) {
        super(`Invalid project path ${projectPath}: ${reason}`);
    }
}

export class FolderNumberNotFound extends LookupError {
    constructor(readonly number: string) {
        super(`No usable folder numbered ${number} in the project`);
    }
}

export class RenameError extends JdsortError {
    readonly code: string | undefined;

    constructor(readonly from: string, readonly to: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to rename ${from} -> ${to}: ${reason}`, { cause });
        this.code = errorCode(cause);
    }
}

export class UserAbort extends JdsortError {
    constructor(message = 'Aborted by user') {
        super(message);
    }
}

function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
