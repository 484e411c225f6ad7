import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { DEFAULT_CONFIG } from '../config/types.js';
import { ConfigError, RunFailedError, TimeoutError, UnreachableError } from '../execution/errors.js';
import {
  FakeClock,
  FakeRobot,
  StaticNeighborTable,
  StubCommandRunner,
  createCapturingLogger,
  type LogLine,
} from '../testing/fakes.js';
import { ProtocolRunOrchestrator } from './ProtocolRunOrchestrator.js';

describe('ProtocolRunOrchestrator', () => {
  let workDir: string;
  let protocolPath: string;
  let scriptPath: string;
  let robot: FakeRobot;
  let runner: StubCommandRunner;
  let neighborTable: StaticNeighborTable;
  let lines: LogLine[];
  let orchestrator: ProtocolRunOrchestrator;

  beforeEach(async () => {
    workDir = join(tmpdir(), `ot2-runner-orchestrator-${randomUUID()}`);
    await mkdir(workDir, { recursive: true });
    protocolPath = join(workDir, 'protocol.py');
    await writeFile(protocolPath, 'def run(ctx):\n    pass\n');
    scriptPath = join(workDir, 'ot2_pipette_smoke_test.py');
    await writeFile(scriptPath, 'print("smoke")\n');

    robot = new FakeRobot(['ot2.local', '169.254.10.2']);
    runner = new StubCommandRunner();
    neighborTable = new StaticNeighborTable([{ address: '169.254.10.2' }]);
    const capture = createCapturingLogger();
    lines = capture.lines;
    const config = { ...DEFAULT_CONFIG, smokeTest: { ...DEFAULT_CONFIG.smokeTest, script: scriptPath } };
    orchestrator = new ProtocolRunOrchestrator(config, {
      logger: capture.logger,
      fetchFn: robot.fetch,
      runner,
      neighborTable,
      clock: new FakeClock(),
    });
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('sends nothing to the run API when the hinted host is unreachable', async () => {
    await expect(
      orchestrator.runProtocol({ protocolPath, host: '10.0.0.5', timeoutSeconds: 600 }),
    ).rejects.toBeInstanceOf(UnreachableError);

    expect(robot.calls()).toEqual(['GET 10.0.0.5 /health']);
    expect(robot.apiCalls()).toEqual([]);
    expect(neighborTable.reads).toBe(0);
  });

  it('returns the succeeded outcome and logs it', async () => {
    robot.queueStatuses('running', 'succeeded');

    const outcome = await orchestrator.runProtocol({ protocolPath, host: 'ot2.local', timeoutSeconds: 600 });

    expect(outcome).toEqual({ kind: 'succeeded', protocolId: 'p1', runId: 'r1', polls: 2 });
    expect(lines.find((line) => line['msg'] === 'Run succeeded: r1')).toMatchObject({
      level: 'info',
      module: 'orchestrator',
      runId: 'r1',
      polls: 2,
    });
  });

  it('auto-discovers the robot when no host is given', async () => {
    robot.queueStatuses('succeeded');

    await orchestrator.runProtocol({ protocolPath, timeoutSeconds: 600 });

    expect(robot.calls()).toEqual([
      'GET opentrons.local /health',
      'GET 169.254.10.2 /health',
      'POST 169.254.10.2 /protocols',
      'POST 169.254.10.2 /runs',
      'POST 169.254.10.2 /runs/r1/actions',
      'GET 169.254.10.2 /runs/r1',
    ]);
  });

  it('throws RunFailedError carrying the run errors', async () => {
    robot.queueStatuses({ json: { data: { id: 'r1', status: 'stopped' } } });

    const error = await orchestrator
      .runProtocol({ protocolPath, host: 'ot2.local', timeoutSeconds: 600 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RunFailedError);
    expect(error instanceof RunFailedError ? error.message : '').toBe('Run ended with status=stopped, run_id=r1');
    expect(error instanceof RunFailedError ? error.details() : {}).toEqual({
      runId: 'r1',
      status: 'stopped',
      errors: null,
    });
  });

  it('throws TimeoutError when the run outlasts the timeout', async () => {
    robot.queueStatuses('running');

    await expect(
      orchestrator.runProtocol({ protocolPath, host: 'ot2.local', timeoutSeconds: 4 }),
    ).rejects.toThrow(new TimeoutError('r1', 4));
    expect(robot.apiCalls().filter((call) => call === 'GET /runs/r1')).toHaveLength(4);
  });

  it('launches the smoke test against the resolved host', async () => {
    await orchestrator.runSmokeTest({ host: '169.254.10.2', mount: 'right' });

    expect(runner.invocations.map((invocation) => invocation.args)).toEqual([['-c', 'import opentrons'], [scriptPath]]);
    expect(runner.invocations[1]?.env).toEqual({
      OT2_HOST: '169.254.10.2',
      OT2_PORT: '31950',
      OT2_SMOKE_TEST_MOUNT: 'right',
    });
    expect(robot.apiCalls()).toEqual([]);
  });

  it('does not launch the smoke test without a reachable robot', async () => {
    await expect(orchestrator.runSmokeTest({ host: '10.0.0.5', mount: 'both' })).rejects.toBeInstanceOf(
      UnreachableError,
    );
    expect(runner.invocations.map((invocation) => invocation.args)).toEqual([['-c', 'import opentrons']]);
  });

  it('checks the smoke-test interpreter before looking for the robot', async () => {
    runner = new StubCommandRunner(
      { ok: false, exitCode: 1, stdout: '', stderr: '', timedOut: false },
      { ok: false, exitCode: 1, stdout: '', stderr: '', timedOut: false },
    );
    const smokeOnly = new ProtocolRunOrchestrator(
      { ...DEFAULT_CONFIG, smokeTest: { ...DEFAULT_CONFIG.smokeTest, script: scriptPath } },
      { logger: createCapturingLogger().logger, fetchFn: robot.fetch, runner, neighborTable },
    );

    await expect(smokeOnly.runSmokeTest({ mount: 'left' })).rejects.toBeInstanceOf(ConfigError);
    expect(robot.requests).toEqual([]);
    expect(neighborTable.reads).toBe(0);
  });

  it('reads PYTHON_BIN from the environment it is given', async () => {
    const withEnv = new ProtocolRunOrchestrator(
      { ...DEFAULT_CONFIG, smokeTest: { ...DEFAULT_CONFIG.smokeTest, script: scriptPath } },
      {
        logger: createCapturingLogger().logger,
        fetchFn: robot.fetch,
        runner,
        neighborTable,
        env: { PYTHON_BIN: '/opt/ot2/bin/python' },
      },
    );

    await withEnv.runSmokeTest({ host: 'ot2.local', mount: 'left' });

    expect(runner.invocations.map((invocation) => invocation.command)).toEqual([
      '/opt/ot2/bin/python',
      '/opt/ot2/bin/python',
    ]);
  });
});
