import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ClientSupervisor, SupervisorState } from './ClientSupervisor';
import { MediaLocator } from './MediaLocator';
import { ScopedOverride } from './TransmissionConfigOverride';
import { MockProcessLauncher } from '../../__mocks__/processLauncher';
import { BackendKind, SessionContext, SessionState } from '../../domain/entities';
import { SessionError, SessionErrorCode } from '../../domain/errors/SessionError';
import { ILogger } from '../../domain/interfaces';
import { StatusRecord } from '../progress/StatusRecord';

const MB = 1024 * 1024;
const MAGNET = 'magnet:?xt=urn:btih:0123456789abcdef0123456789abcdef01234567&tr=udp%3A%2F%2Ftracker.test%3A1337';

describe('ClientSupervisor', () => {
    let tmpDir: string;
    let cacheDir: string;
    let mockLogger: ILogger;
    let launcher: MockProcessLauncher;
    let override: ScopedOverride;
    let transitions: SupervisorState[];
    let controller: AbortController;

    const createContext = (overrides: Partial<SessionContext> = {}): SessionContext => ({
        sessionId: 'session-1',
        source: { kind: 'magnet', identifier: MAGNET, infoHash: '0123456789abcdef0123456789abcdef01234567' },
        normalizedSource: MAGNET,
        options: { enableSubtitles: true, movieTitle: 'Test Movie' },
        startedAt: Date.now(),
        cacheDir,
        statusRecord: new StatusRecord(mockLogger),
        signal: controller.signal,
        ...overrides
    });

    const createSupervisor = (): ClientSupervisor => new ClientSupervisor(
        launcher,
        new MediaLocator(),
        mockLogger,
        {
            outputDir: path.join(tmpDir, 'runtime'),
            transmissionConfigDir: path.join(tmpDir, 'transmission'),
            gracePeriodMs: 20,
            firstByteTimeoutMs: 100,
            mediaLocateTimeoutMs: 100,
            pollIntervalMs: 5,
            killGraceMs: 10
        },
        (state) => transitions.push(state),
        () => override
    );

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'supervisor-'));
        cacheDir = path.join(tmpDir, 'cache', '0123456789abcdef0123456789abcdef01234567');
        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };
        launcher = new MockProcessLauncher();
        launcher.available.add('transmission-cli');
        override = {
            apply: vi.fn().mockResolvedValue(undefined),
            release: vi.fn().mockResolvedValue(undefined)
        };
        transitions = [];
        controller = new AbortController();
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('launch', () => {
        it('should keep a healthy primary', async () => {
            const supervisor = createSupervisor();

            const backend = await supervisor.launch(createContext({ options: { enableSubtitles: true, movieTitle: 'Test Movie', fileIndex: 2 } }));

            expect(backend.kind).toBe(BackendKind.PRIMARY);
            expect(backend.streamUrl).toBe('http://localhost:8888/');
            expect(launcher.spawned).toHaveLength(1);
            expect(launcher.spawned[0].command).toBe('peerflix');
            expect(launcher.spawned[0].args).toEqual([
                MAGNET, '--port', '8888', '--path', cacheDir, '--index', '2', '--remove'
            ]);
            expect(launcher.spawned[0].options).toMatchObject({
                captureOutput: true,
                outputFile: path.join(tmpDir, 'runtime', 'session-1-primary.log')
            });
            expect(transitions).toEqual([SessionState.LAUNCHING_PRIMARY, SessionState.DOWNLOADING]);
            expect(fs.existsSync(cacheDir)).toBe(true);
        });

        it('should fall back once when the primary exits inside the grace window', async () => {
            launcher.onSpawn = (child) => {
                if (child.command === 'peerflix') {
                    child.emit('Error: something went wrong\n');
                    child.exit(1);
                }
            };
            const supervisor = createSupervisor();

            const backend = await supervisor.launch(createContext());

            expect(backend.kind).toBe(BackendKind.FALLBACK);
            expect(backend.streamUrl).toBeUndefined();
            expect(launcher.spawnedBy('transmission-cli')).toHaveLength(1);
            expect(launcher.spawnedBy('transmission-cli')[0].args).toEqual([
                '--config-dir', path.join(tmpDir, 'transmission'),
                '--download-dir', cacheDir,
                MAGNET
            ]);
            expect(override.apply).toHaveBeenCalledTimes(1);
            expect(transitions).toEqual([
                SessionState.LAUNCHING_PRIMARY,
                SessionState.LAUNCHING_FALLBACK,
                SessionState.DOWNLOADING
            ]);
        });

        it('should name the fatal signature when the primary exits with one', async () => {
            launcher.onSpawn = (child) => {
                if (child.command === 'peerflix') {
                    child.emit('Invalid data: bad bencode\n');
                    child.exit(1);
                }
            };
            const supervisor = createSupervisor();

            const backend = await supervisor.launch(createContext());

            expect(backend.kind).toBe(BackendKind.FALLBACK);
            expect(mockLogger.warn).toHaveBeenCalledWith(
                'peerflix failed: exited with code 1 (fatal output "Invalid data: bad bencode"), switching to transmission-cli'
            );
        });

        it('should keep a primary that prints a fatal signature but stays alive', async () => {
            launcher.onSpawn = (child) => child.emit('Missing delimiter\n');
            const supervisor = createSupervisor();

            const backend = await supervisor.launch(createContext());

            expect(backend.kind).toBe(BackendKind.PRIMARY);
            expect(launcher.spawnedBy('peerflix')[0].terminateCalls).toBe(0);
            expect(launcher.spawnedBy('transmission-cli')).toHaveLength(0);
        });

        it('should not fall back on recoverable error output', async () => {
            launcher.onSpawn = (child) => child.emit('Error: tracker timed out\n');
            const supervisor = createSupervisor();

            const backend = await supervisor.launch(createContext());

            expect(backend.kind).toBe(BackendKind.PRIMARY);
        });

        it('should purge primary leftovers before the fallback starts', async () => {
            launcher.onSpawn = (child) => {
                if (child.command === 'peerflix') {
                    fs.mkdirSync(cacheDir, { recursive: true });
                    fs.writeFileSync(path.join(cacheDir, 'partial.mkv'), 'partial');
                    child.exit(1);
                }
            };
            const supervisor = createSupervisor();

            await supervisor.launch(createContext());

            expect(fs.existsSync(path.join(cacheDir, 'partial.mkv'))).toBe(false);
            expect(fs.existsSync(cacheDir)).toBe(true);
        });

        it('should fail with remediation when the fallback is not installed', async () => {
            launcher.available.clear();
            launcher.onSpawn = (child) => child.exit(1);
            const supervisor = createSupervisor();

            const error = await supervisor.launch(createContext()).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(SessionError);
            expect(error).toMatchObject({ code: SessionErrorCode.BACKEND_LAUNCH_FAILED });
            expect(error instanceof SessionError && error.actionable).toBe(true);
            expect(launcher.spawnedBy('transmission-cli')).toHaveLength(0);
            expect(supervisor.state).toBe(SessionState.FAILED);
        });

        it('should fail when both backends exit early, without a second fallback', async () => {
            launcher.onSpawn = (child) => child.exit(1);
            const supervisor = createSupervisor();

            await expect(supervisor.launch(createContext())).rejects.toMatchObject({
                code: SessionErrorCode.BACKEND_LAUNCH_FAILED
            });
            expect(launcher.spawned.map((child) => child.command)).toEqual(['peerflix', 'transmission-cli']);
            expect(transitions[transitions.length - 1]).toBe(SessionState.FAILED);
        });

        it('should stop with a cancellation during the grace window', async () => {
            const supervisor = createSupervisor();
            const pending = supervisor.launch(createContext());
            controller.abort();

            await expect(pending).rejects.toMatchObject({ code: SessionErrorCode.CANCELLED });
            expect(supervisor.state).toBe(SessionState.LAUNCHING_PRIMARY);

            await supervisor.shutdown();
            expect(launcher.spawned[0].terminateCalls).toBe(1);
        });
    });

    describe('waitForFirstBytes', () => {
        it('should resolve once data lands in the cache', async () => {
            const supervisor = createSupervisor();
            const context = createContext();
            await supervisor.launch(context);
            fs.writeFileSync(path.join(cacheDir, 'piece'), Buffer.alloc(64));

            await expect(supervisor.waitForFirstBytes(context)).resolves.toBe(64);
        });

        it('should time out when nothing arrives', async () => {
            const supervisor = createSupervisor();
            const context = createContext();
            await supervisor.launch(context);

            await expect(supervisor.waitForFirstBytes(context)).rejects.toMatchObject({
                code: SessionErrorCode.FIRST_BYTE_TIMEOUT
            });
        });

        it('should stop the fallback and restore its config before reporting a timeout', async () => {
            launcher.onSpawn = (child) => {
                if (child.command === 'peerflix') {
                    child.exit(1);
                }
            };
            const supervisor = createSupervisor();
            const context = createContext();
            await supervisor.launch(context);
            const fallback = launcher.spawnedBy('transmission-cli')[0];

            await expect(supervisor.waitForFirstBytes(context)).rejects.toMatchObject({
                code: SessionErrorCode.FIRST_BYTE_TIMEOUT
            });

            expect(fallback.exited).toBe(true);
            expect(fallback.terminateCalls).toBe(1);
            expect(override.release).toHaveBeenCalledTimes(1);
            expect(supervisor.state).toBe(SessionState.FAILED);

            await supervisor.shutdown();
            expect(fallback.terminateCalls).toBe(1);
            expect(override.release).toHaveBeenCalledTimes(1);
        });

        it('should fail when the backend dies', async () => {
            const supervisor = createSupervisor();
            const context = createContext();
            await supervisor.launch(context);
            launcher.spawned[0].emit('peer connection lost\n');
            launcher.spawned[0].exit(1);

            await expect(supervisor.waitForFirstBytes(context)).rejects.toMatchObject({
                code: SessionErrorCode.BACKEND_DIED,
                diagnostics: ['peer connection lost']
            });
        });
    });

    describe('locateMedia', () => {
        it('should return the media with the stream url', async () => {
            const supervisor = createSupervisor();
            const context = createContext();
            await supervisor.launch(context);
            const video = path.join(cacheDir, 'Movie', 'movie.mkv');
            fs.mkdirSync(path.dirname(video), { recursive: true });
            fs.writeFileSync(video, '');
            fs.truncateSync(video, 2 * MB);

            const asset = await supervisor.locateMedia(context);

            expect(asset).toEqual({ videoPath: video, streamUrl: 'http://localhost:8888/' });
            expect(transitions.slice(-2)).toEqual([SessionState.LOCATING_MEDIA, SessionState.READY]);
        });

        it('should fail with a directory listing when no video appears', async () => {
            const supervisor = createSupervisor();
            const context = createContext();
            await supervisor.launch(context);
            fs.writeFileSync(path.join(cacheDir, 'readme.txt'), 'hello');

            await expect(supervisor.locateMedia(context)).rejects.toMatchObject({
                code: SessionErrorCode.MEDIA_NOT_FOUND,
                diagnostics: ['readme.txt (5 B)']
            });
        });
    });

    describe('shutdown', () => {
        it('should terminate the backend and release the override once', async () => {
            launcher.onSpawn = (child) => {
                if (child.command === 'peerflix') {
                    child.exit(1);
                }
            };
            const supervisor = createSupervisor();
            await supervisor.launch(createContext());

            await Promise.all([supervisor.shutdown(), supervisor.shutdown()]);
            await supervisor.shutdown();

            expect(launcher.spawnedBy('transmission-cli')[0].terminateCalls).toBe(1);
            expect(override.release).toHaveBeenCalledTimes(1);
        });

        it('should record captured output files', async () => {
            const supervisor = createSupervisor();
            await supervisor.launch(createContext());

            expect(supervisor.outputFiles).toEqual([path.join(tmpDir, 'runtime', 'session-1-primary.log')]);
        });
    });

    describe('listFiles', () => {
        it('should run the primary in list mode on the terminal', async () => {
            launcher.onSpawn = (child) => child.exit(0);
            const supervisor = createSupervisor();

            const code = await supervisor.listFiles(MAGNET);

            expect(code).toBe(0);
            expect(launcher.spawned[0].args).toEqual([MAGNET, '--list']);
            expect(launcher.spawned[0].options).toEqual({ inheritStdio: true });
        });

        it('should explain how to install a missing primary', async () => {
            launcher.onSpawn = (child) => child.exit(null, null, new Error('spawn peerflix ENOENT'));
            const supervisor = createSupervisor();

            await expect(supervisor.listFiles(MAGNET)).rejects.toMatchObject({
                code: SessionErrorCode.BACKEND_LAUNCH_FAILED
            });
        });
    });
});
