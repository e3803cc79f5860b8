import { describe, it, expect } from 'vitest';
import { ExternalToolError } from './errors';
import { describeFailure, LocalExecutor } from './executor';

describe('describeFailure', () => {
    it('includes the exit code and stderr', () => {
        const error = Object.assign(new Error('Command failed'), { code: 1, stderr: 'Failed to connect to bus\n' });

        const failure = describeFailure('systemctl list-units', error, 10000);

        expect(failure.message).toBe('systemctl list-units exited with code 1: Failed to connect to bus');
        expect(failure.exitCode).toBe(1);
        expect(failure.stderr).toBe('Failed to connect to bus');
        expect(failure.command).toBe('systemctl list-units');
    });

    it('names a timeout', () => {
        const error = Object.assign(new Error('Command failed'), { killed: true, signal: 'SIGTERM', code: null });

        expect(describeFailure('ss -tlnpH', error, 2500).message).toBe('ss -tlnpH timed out after 2500ms');
    });

    it('names a missing binary', () => {
        const error = Object.assign(new Error('spawn ss ENOENT'), { code: 'ENOENT' });

        expect(describeFailure('ss -tlnpH', error, 2500).message).toBe('ss -tlnpH: command not found');
    });

    it('wraps values that are not errors', () => {
        expect(describeFailure('ss -tlnpH', 'boom', 2500).message).toBe('ss -tlnpH failed: boom');
    });
});

describe('LocalExecutor', () => {
    const executor = new LocalExecutor(5000);
    const node = process.execPath;

    it('runs the command with the C locale', async () => {
        const { stdout } = await executor.exec(node, ['-e', 'process.stdout.write(process.env.LC_ALL ?? "")']);

        expect(stdout).toBe('C');
    });

    it('passes arguments without a shell', async () => {
        const { stdout } = await executor.exec(node, ['-e', 'process.stdout.write(process.argv[1])', '$HOME; echo hi']);

        expect(stdout).toBe('$HOME; echo hi');
    });

    it('stops a command that outlives its timeout', async () => {
        const run = executor.exec(node, ['-e', 'setTimeout(() => {}, 5000)'], { timeoutMs: 100 });

        await expect(run).rejects.toBeInstanceOf(ExternalToolError);
        await expect(run).rejects.toThrow(/timed out after 100ms$/);
    });

    it('reports the exit code and stderr of a failed command', async () => {
        const run = executor.exec(node, ['-e', 'process.stderr.write("boom"); process.exit(3)']);

        await expect(run).rejects.toMatchObject({ exitCode: 3, stderr: 'boom' });
    });

    it('reports a binary that does not exist', async () => {
        await expect(executor.exec('unitdeck-no-such-binary', ['--version']))
            .rejects.toThrow('unitdeck-no-such-binary --version: command not found');
    });
});
