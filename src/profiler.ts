import { CallStackEngine } from './shared/callTree';
import type { TraceNode } from './shared/callTree';
import { classifyMessage } from './shared/eventClassifier';
import { createLogLineDecoder } from './shared/logLine';
import type { ProfilerConfig } from './utils/config';
import { readLogLines } from './utils/logFile';
import { isTraceEnabled, logInfo, logTrace, logWarn } from './utils/logger';

export type ProfileStats = {
  linesRead: number;
  linesDecoded: number;
  startSignals: number;
  endSignals: number;
  discardedEnds: number;
  forcedClosures: number;
};

export type ProfileResult = {
  forest: readonly TraceNode[];
  stats: ProfileStats;
};

/** Decode, classify and feed every line to a fresh engine, then close whatever is still open. */
export async function profileLines(
  lines: AsyncIterable<string> | Iterable<string>,
  config: ProfilerConfig
): Promise<ProfileResult> {
  const decode = createLogLineDecoder(config);
  const engine = new CallStackEngine();
  const stats: ProfileStats = {
    linesRead: 0,
    linesDecoded: 0,
    startSignals: 0,
    endSignals: 0,
    discardedEnds: 0,
    forcedClosures: 0
  };

  for await (const line of lines) {
    stats.linesRead++;
    const decoded = decode(line);
    if (!decoded) continue;
    stats.linesDecoded++;
    const signal = classifyMessage(config.events, decoded.message);
    if (!signal) continue;
    if (signal.kind === 'start') stats.startSignals++;
    else stats.endSignals++;
    const outcome = engine.observe(decoded.threadId, decoded.instant, signal);
    if (outcome === 'discarded') {
      stats.discardedEnds++;
      if (isTraceEnabled()) {
        logTrace(`Discarded end of ${signal.definition.name} on thread ${decoded.threadId} (line ${stats.linesRead})`);
      }
    }
  }

  stats.forcedClosures = engine.finalize();
  if (stats.forcedClosures > 0) {
    logWarn(`${stats.forcedClosures} event(s) never ended; closed with zero duration`);
  }
  return { forest: engine.forest, stats };
}

export async function profileLogFile(filePath: string, config: ProfilerConfig): Promise<ProfileResult> {
  logInfo(`Analyzing: ${filePath}`);
  const result = await profileLines(readLogLines(filePath), config);
  logInfo('Profile finished', result.stats);
  return result;
}
