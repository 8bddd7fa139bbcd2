/**
 * Recording player control channel for testing
 */

import { IPlayerControlChannel, PlayerCommand } from '../domain/interfaces';

export class MockControlChannel implements IPlayerControlChannel {
    readonly sent: PlayerCommand[] = [];
    closed = false;
    failWith: Error | null = null;

    constructor(readonly endpoint: string = '/tmp/mock-mpv.sock') { }

    async send(command: PlayerCommand): Promise<void> {
        if (this.failWith) {
            throw this.failWith;
        }
        this.sent.push(command);
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    /**
     * Command names in the order they were sent
     */
    names(): string[] {
        return this.sent.map((entry) => entry.command[0]);
    }
}
