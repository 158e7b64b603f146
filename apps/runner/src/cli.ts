import type { ScenarioCommandPort } from '@anomaly-lab/domain';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_ERROR = 2;

export const USAGE = 'usage: anomaly-lab <scenario-id | all | list>';

/**
 * Run one scenario (or every scenario with `all`) and print its log.
 * Resolves to the process exit status: 0 when every verdict passed, 1 when one
 * failed, 2 on usage errors and errors the orchestrator could not recover from.
 */
export async function runCli(
  target: string | undefined,
  service: ScenarioCommandPort,
  io: CliIo,
): Promise<number> {
  if (!target) {
    io.err(USAGE);
    return EXIT_ERROR;
  }

  if (target === 'list') {
    for (const s of service.listScenarios()) io.out(`${s.id}\t${s.title}`);
    return EXIT_PASS;
  }

  const ids = target === 'all' ? service.listScenarios().map((s) => s.id) : [target];
  let failed = false;
  for (const [n, scenarioId] of ids.entries()) {
    if (n > 0) io.out('');
    try {
      const result = await service.runScenario({ scenarioId });
      for (const line of result.rendered) io.out(line);
      if (!result.verdict.pass) failed = true;
    } catch (err) {
      io.err(`[runner] ${scenarioId}: ${err instanceof Error ? err.message : String(err)}`);
      return EXIT_ERROR;
    }
  }
  return failed ? EXIT_FAIL : EXIT_PASS;
}
