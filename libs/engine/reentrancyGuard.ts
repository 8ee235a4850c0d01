import { StateError } from '../errors/credentialErrors.js';

/**
 * Rejects any mutating operation that starts while another one is still
 * executing, including calls made back into the engine by an external
 * collaborator during value forwarding.
 */
export class ReentrancyGuard {
    private activeOperation: string | null = null;

    public run<T>(operation: string, fn: () => T): T {
        if (this.activeOperation !== null) {
            throw new StateError(
                'REENTRANT_CALL',
                `${operation} called while ${this.activeOperation} is in progress`
            );
        }
        this.activeOperation = operation;
        try {
            return fn();
        } finally {
            this.activeOperation = null;
        }
    }

    public get inProgress(): boolean {
        return this.activeOperation !== null;
    }
}
