/**
 * Plan Executor
 *
 * Runs a command plan: the video-side stages (single, piped, or in
 * sequence) and an optional background audio stage joined at the end.
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';
import { PlanError, type CommandPlan, type Stage, type StageRole } from '@termplay/core';
import {
  formatCommandLine,
  launchProcess,
  silentLogger,
  type LaunchedProcess,
  type Launcher,
  type Logger,
  type StdioMode,
} from '@termplay/utils';

export interface StageOutcome {
  role: StageRole;
  command: string;
  exitCode: number;
  signal: NodeJS.Signals | null;
}

export interface ExecutionResult {
  /** Exit code of the video side. Audio never changes it. */
  exitCode: number;
  /** The stage whose non-zero exit decided the result. */
  failedStage: StageOutcome | null;
  stages: StageOutcome[];
  audio: StageOutcome | null;
}

export interface PlanExecutorOptions {
  launcher?: Launcher;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Stream fed to stages reading the run's input. Defaults to process.stdin. */
  input?: Readable;
}

interface RunningStage {
  stage: Stage;
  process: LaunchedProcess;
  finished: Promise<StageOutcome>;
}

const EXPECTED_STAGE_COUNT = { single: 1, pipeline: 2, sequence: 2 } as const;

/**
 * Check a plan's shape before any process starts
 */
export function validatePlan(plan: CommandPlan): void {
  const expected = EXPECTED_STAGE_COUNT[plan.linkage];
  if (plan.stages.length !== expected) {
    throw new PlanError(
      `A ${plan.linkage} plan for ${plan.format} needs ${expected} video-side stage(s), got ${plan.stages.length}`,
      { format: plan.format, linkage: plan.linkage }
    );
  }

  plan.stages.forEach((stage, index) => {
    if (!stage.command || stage.role === 'audio') {
      throw new PlanError(`Invalid ${stage.role} stage at position ${index} for ${plan.format}`, { index });
    }
    const upstreamExpected = plan.linkage === 'pipeline' && index === 1;
    if ((stage.stdin === 'upstream') !== upstreamExpected) {
      throw new PlanError(`Stage ${index} (${stage.role}) has no upstream stage to read from`, { index });
    }
    const downstreamExpected = plan.linkage === 'pipeline' && index === 0;
    if ((stage.stdout.kind === 'downstream') !== downstreamExpected) {
      throw new PlanError(`Stage ${index} (${stage.role}) has no downstream stage to write to`, { index });
    }
  });

  if (plan.audio && (plan.audio.role !== 'audio' || !plan.audio.command)) {
    throw new PlanError(`Invalid audio stage for ${plan.format}`);
  }
}

async function closeSinks(sinks: Map<Stage, FileHandle>): Promise<void> {
  const handles = [...sinks.values()];
  sinks.clear();
  await Promise.all(handles.map((handle) => handle.close()));
}

/**
 * Fans the run's input stream out to every stage that reads it
 */
class SourceFanout {
  private readonly targets = new Set<Writable>();
  private source: Readable | null = null;

  constructor(
    private readonly resolveSource: () => Readable,
    private readonly logger: Logger
  ) {}

  attach(target: Writable, role: StageRole): void {
    if (!this.source) {
      this.source = this.resolveSource();
    }
    const source = this.source;
    target.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EPIPE' || error.code === 'ERR_STREAM_DESTROYED') {
        this.logger.debug({ role }, 'Stage closed its input early');
      } else {
        this.logger.warn({ err: error, role }, 'Could not feed input to stage');
      }
      this.detach(target);
    });
    this.targets.add(target);
    source.pipe(target);
  }

  private detach(target: Writable): void {
    if (!this.targets.delete(target)) return;
    this.source?.unpipe(target);
  }

  close(): void {
    for (const target of [...this.targets]) {
      this.detach(target);
    }
    this.source?.pause();
  }
}

/**
 * Handle for the background audio stage. Joined exactly once.
 */
export class BackgroundTask {
  private joined = false;

  constructor(private readonly running: RunningStage) {}

  get stage(): Stage {
    return this.running.stage;
  }

  cancel(): void {
    this.running.process.kill('SIGTERM');
  }

  async join(): Promise<StageOutcome> {
    if (this.joined) {
      throw new Error(`Background ${this.running.stage.role} task already joined`);
    }
    this.joined = true;
    return this.running.finished;
  }
}

export class PlanExecutor {
  private readonly launcher: Launcher;
  private readonly logger: Logger;

  constructor(options: PlanExecutorOptions = {}) {
    this.launcher = options.launcher ?? launchProcess;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(plan: CommandPlan, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    validatePlan(plan);

    const sinks = await this.openFileSinks(plan);
    const fanout = new SourceFanout(() => options.input ?? process.stdin, this.logger);
    const audioTask = plan.audio ? new BackgroundTask(this.startStage(plan.audio, fanout, sinks)) : null;

    let stages: StageOutcome[];
    try {
      stages = await this.runVideoSide(plan, fanout, sinks);
    } catch (error) {
      if (audioTask) {
        audioTask.cancel();
        await audioTask.join();
      }
      fanout.close();
      throw error;
    } finally {
      await closeSinks(sinks);
    }

    const audio = audioTask ? await audioTask.join() : null;
    fanout.close();

    if (audio && audio.exitCode !== 0) {
      this.logger.warn({ exitCode: audio.exitCode, signal: audio.signal }, 'Audio playback exited with an error');
    }

    const deciding = stages[stages.length - 1];
    const exitCode = deciding?.exitCode ?? 1;

    return {
      exitCode,
      failedStage: exitCode !== 0 && deciding ? deciding : null,
      stages,
      audio,
    };
  }

  /**
   * Open every output file up front so a bad path fails before any process starts
   */
  private async openFileSinks(plan: CommandPlan): Promise<Map<Stage, FileHandle>> {
    const sinks = new Map<Stage, FileHandle>();
    for (const stage of plan.stages) {
      if (stage.stdout.kind === 'file') {
        try {
          sinks.set(stage, await open(stage.stdout.path, 'w'));
        } catch (error) {
          await closeSinks(sinks);
          throw error;
        }
      }
    }
    return sinks;
  }

  private async runVideoSide(
    plan: CommandPlan,
    fanout: SourceFanout,
    sinks: Map<Stage, FileHandle>
  ): Promise<StageOutcome[]> {
    const [first, second] = plan.stages;
    if (!first) {
      throw new PlanError(`No video-side stage for ${plan.format}`);
    }

    switch (plan.linkage) {
      case 'single': {
        return [await this.startStage(first, fanout, sinks).finished];
      }

      case 'pipeline': {
        if (!second) throw new PlanError(`Missing render stage for ${plan.format}`);
        const upstream = this.startStage(first, fanout, sinks);
        const downstream = this.startStage(second, fanout, sinks, upstream.process.stdout);
        // Once the render stage is gone, close the pipe so the producer gets EPIPE
        const rendered = downstream.finished.then((outcome) => {
          upstream.process.stdout?.destroy();
          return outcome;
        });
        const [upstreamOutcome, downstreamOutcome] = await Promise.all([upstream.finished, rendered]);
        if (upstreamOutcome.exitCode !== 0) {
          this.logger.debug(
            { role: upstreamOutcome.role, exitCode: upstreamOutcome.exitCode },
            'Upstream stage exited non-zero; pipeline result follows the render stage'
          );
        }
        return [upstreamOutcome, downstreamOutcome];
      }

      case 'sequence': {
        if (!second) throw new PlanError(`Missing render stage for ${plan.format}`);
        const extraction = await this.startStage(first, fanout, sinks).finished;
        if (extraction.exitCode !== 0) {
          return [extraction];
        }
        const render = await this.startStage(second, fanout, sinks).finished;
        return [extraction, render];
      }
    }
  }

  private startStage(
    stage: Stage,
    fanout: SourceFanout,
    sinks: Map<Stage, FileHandle>,
    upstream: Readable | null = null
  ): RunningStage {
    const stdin: StdioMode = stage.stdin === 'none' ? 'ignore' : 'pipe';
    const file = sinks.get(stage);
    let stdout: StdioMode | number;

    switch (stage.stdout.kind) {
      case 'terminal':
        stdout = 'inherit';
        break;
      case 'downstream':
        stdout = 'pipe';
        break;
      case 'discard':
        stdout = 'ignore';
        break;
      case 'file':
        if (!file) {
          throw new PlanError(`Output file for the ${stage.role} stage was not opened`);
        }
        stdout = file.fd;
        break;
    }

    const commandLine = formatCommandLine(stage.command, stage.args);
    this.logger.debug({ role: stage.role, command: commandLine }, 'Starting stage');

    const child = this.launcher(stage.command, stage.args, {
      stdin,
      stdout,
      stderr: stage.role === 'audio' ? 'ignore' : 'inherit',
    });

    if (child.stdin) {
      if (stage.stdin === 'source') {
        fanout.attach(child.stdin, stage.role);
      } else if (stage.stdin === 'upstream') {
        if (upstream) {
          this.connect(upstream, child.stdin, stage.role);
        } else {
          child.stdin.end();
        }
      }
    }

    const finished = child.exited.then(async (exit): Promise<StageOutcome> => {
      if (file) {
        sinks.delete(stage);
        await file.close();
      }
      if (exit.error) {
        this.logger.error({ err: exit.error, role: stage.role, command: commandLine }, 'Could not start stage');
      }
      this.logger.debug({ role: stage.role, exitCode: exit.code, signal: exit.signal }, 'Stage exited');
      return { role: stage.role, command: stage.command, exitCode: exit.code, signal: exit.signal };
    });

    return { stage, process: child, finished };
  }

  private connect(upstream: Readable, downstream: Writable, role: StageRole): void {
    downstream.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EPIPE' || error.code === 'ERR_STREAM_DESTROYED') {
        this.logger.debug({ role }, 'Stage stopped reading from upstream');
      } else {
        this.logger.warn({ err: error, role }, 'Pipe to stage failed');
      }
      upstream.unpipe(downstream);
      upstream.destroy();
    });
    upstream.pipe(downstream);
  }
}
