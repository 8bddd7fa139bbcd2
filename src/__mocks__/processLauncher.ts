/**
 * In-memory process launcher for testing
 */

import {
    IManagedProcess,
    IProcessLauncher,
    ProcessExit,
    SpawnOptions
} from '../domain/interfaces';

export class MockProcess implements IManagedProcess {
    readonly exitPromise: Promise<ProcessExit>;
    exitInfo: ProcessExit | null = null;
    terminateCalls = 0;
    private text = '';
    private resolveExit: (exit: ProcessExit) => void = () => { };

    constructor(
        readonly command: string,
        readonly args: string[],
        readonly pid: number | undefined,
        readonly options: SpawnOptions
    ) {
        this.exitPromise = new Promise<ProcessExit>((resolve) => {
            this.resolveExit = resolve;
        });
    }

    get exited(): boolean {
        return this.exitInfo !== null;
    }

    output(): string {
        return this.text;
    }

    /**
     * Appends to the captured output as the real process would
     */
    emit(text: string): void {
        this.text += text;
    }

    exit(code: number | null = 0, signal: NodeJS.Signals | null = null, error?: Error): void {
        if (this.exitInfo !== null) {
            return;
        }
        this.exitInfo = error ? { code, signal, error } : { code, signal };
        this.resolveExit(this.exitInfo);
    }

    async terminate(): Promise<void> {
        this.terminateCalls++;
        this.exit(null, 'SIGTERM');
    }
}

export class MockProcessLauncher implements IProcessLauncher {
    readonly spawned: MockProcess[] = [];
    readonly available = new Set<string>();
    // Pids of processes not started through this launcher
    readonly externalPids = new Set<number>();
    readonly killed: Array<{ pid: number; signal: NodeJS.Signals }> = [];
    onSpawn: (process: MockProcess) => void = () => { };
    private nextPid = 4000;

    spawn(command: string, args: readonly string[], options: SpawnOptions = {}): MockProcess {
        const child = new MockProcess(command, [...args], this.nextPid++, options);
        this.spawned.push(child);
        this.onSpawn(child);
        return child;
    }

    isAvailable(command: string): boolean {
        return this.available.has(command);
    }

    isAlive(pid: number): boolean {
        const child = this.spawned.find((candidate) => candidate.pid === pid);
        return child ? !child.exited : this.externalPids.has(pid);
    }

    kill(pid: number, signal: NodeJS.Signals): boolean {
        this.killed.push({ pid, signal });
        const child = this.spawned.find((candidate) => candidate.pid === pid);
        if (child) {
            child.exit(null, signal);
            return true;
        }
        return this.externalPids.delete(pid);
    }

    spawnedBy(command: string): MockProcess[] {
        return this.spawned.filter((child) => child.command === command);
    }
}
