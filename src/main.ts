/**
 * Entry point: load config, build the discussion pipeline, start the control server and the loop.
 * Missing provider credentials degrade to canned lines / silent turns instead of failing start-up.
 */

import { loadConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { createTTS } from "./adapters/tts";
import { DiscussionHistory } from "./memory/history";
import { loadPersonaRegistry } from "./personas/registry";
import { loadTopicCatalog } from "./personas/topics";
import { UtteranceFilter } from "./pipeline/utterance-filter";
import { UtteranceGenerator } from "./pipeline/utterance-generator";
import { SpeechSynthesizer } from "./speech/synthesizer";
import { FfmpegFeed } from "./egress/ffmpeg-feed";
import { FeedOverlay } from "./egress/overlay";
import { FfplayPlayer } from "./egress/local-player";
import { EgressSink } from "./egress/sink";
import { LiveStreamController } from "./egress/controller";
import { createLivePlatform } from "./platform";
import { EventBroadcaster } from "./events/broadcaster";
import { buildSnapshot } from "./events/snapshot";
import { TurnScheduler } from "./scheduler/turn-scheduler";
import { DiscussionLoop } from "./scheduler/discussion-loop";
import { startControlServer } from "./control-server";
import { logger, logError } from "./logging";
import { startWatchdog } from "./metrics";

const WATCHDOG_INTERVAL_MS = 30_000;

async function main(): Promise<void> {
  const config = loadConfig();
  const registry = loadPersonaRegistry(config.discussion.personasFile);
  const topics = loadTopicCatalog(config.discussion.topicsFile);
  const llm = createLLM(config);
  const tts = createTTS(config);
  logger.info(
    {
      event: "STARTUP",
      personas: registry.size,
      topics: topics.size,
      llm: llm.available ? config.llm.provider : "canned",
      tts: tts.available ? tts.provider : "none",
      platform: config.platform.kind,
    },
    "Starting roundtable"
  );

  const synthesizer = new SpeechSynthesizer({
    tts,
    cacheDir: config.tts.cacheDir,
    defaultVoiceId: config.tts.defaultVoiceId,
    timeoutMs: config.tts.timeoutMs,
    maxEntries: config.tts.cacheMaxEntries,
    maxAgeMs: config.tts.cacheMaxAgeMs,
  });
  await synthesizer.init();

  // The scheduler and stream controller are declared below; the snapshot is only read after wiring.
  const broadcaster: EventBroadcaster = new EventBroadcaster({
    snapshot: () =>
      buildSnapshot({
        registry,
        state: scheduler.getSnapshot(),
        loopEnabled: loop.isEnabled,
        stream: stream.status(),
      }),
  });

  const overlay = config.egress.overlay ? new FeedOverlay({ dir: config.egress.overlayDir }) : null;
  if (overlay) {
    await overlay.init();
    broadcaster.subscribe((envelope) => overlay.handle(envelope));
  }

  const stream = new LiveStreamController({
    platform: createLivePlatform(config),
    events: broadcaster,
    createFeed: (target, hooks) =>
      new FfmpegFeed({
        ffmpegPath: config.egress.ffmpegPath,
        target,
        videoSize: config.egress.videoSize,
        backgroundColor: config.egress.backgroundColor,
        overlay: overlay?.files,
        fontFile: config.egress.fontFile,
        hooks,
      }),
  });

  const egress = new EgressSink({
    feeds: stream,
    events: broadcaster,
    player: config.egress.localPlayback ? new FfplayPlayer(config.egress.ffplayPath) : null,
    ffmpegPath: config.egress.ffmpegPath,
    ffprobePath: config.egress.ffprobePath,
    graceMs: config.egress.graceMs,
  });

  const generator = new UtteranceGenerator({
    llm,
    timeoutMs: config.llm.timeoutMs,
    filter: new UtteranceFilter({ maxChars: config.discussion.maxUtteranceChars }),
  });

  const d = config.discussion;
  const scheduler = new TurnScheduler({
    registry,
    topics,
    generator,
    synthesizer,
    egress,
    events: broadcaster,
    history: new DiscussionHistory({ maxEntries: d.historyRetention }),
    pacing: {
      historyWindow: d.historyWindow,
      interTurnPauseMinMs: d.interTurnPauseMinMs,
      interTurnPauseMaxMs: d.interTurnPauseMaxMs,
      interRoundDelayMs: d.interRoundDelayMs,
      topicRotationProbability: d.topicRotationProbability,
      postSpeechBufferMs: d.postSpeechBufferMs,
    },
  });

  const loop = new DiscussionLoop({
    scheduler,
    startDelayMs: d.loopStartDelayMs,
    idlePollMs: d.loopIdlePollMs,
    errorBackoffMs: d.loopErrorBackoffMs,
  });

  const control = await startControlServer(
    { registry, scheduler, loop, stream, synthesizer, egress, broadcaster, defaultVoiceId: config.tts.defaultVoiceId },
    config.server.port
  );
  loop.start(d.autoStart);

  // A turn (pauses included) should never take this long; the stall check only runs while enabled.
  const stallMs = config.llm.timeoutMs + config.tts.timeoutMs + config.egress.graceMs + 60_000 + d.interRoundDelayMs;
  const stopWatchdog = startWatchdog(
    { intervalMs: WATCHDOG_INTERVAL_MS, egressFailCountBeforeRestart: 3, discussionFailCountBeforeAlert: 2 },
    {
      onEgressUnhealthy: async () => {
        broadcaster.publish("stream_warning", { message: "Live feed is not connected or has stalled; stopping it" });
        await stream.stop("watchdog");
      },
      onDiscussionStalled: () => {
        logger.warn({ event: "DISCUSSION_STALLED", state: scheduler.getSnapshot() }, "Watchdog: discussion made no progress");
      },
    },
    {
      egress: () => {
        const s = stream.status();
        return !s.is_streaming || (s.connected && !s.stalled);
      },
      discussion: () => {
        const s = scheduler.getSnapshot();
        if (!loop.isEnabled || !s.running || s.lastTurnAt === null) return true;
        return Date.now() - s.lastTurnAt < stallMs;
      },
    }
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down");
    stopWatchdog();
    scheduler.requestStop();
    await stream.stop("shutdown");
    await loop.shutdown();
    await overlay?.flush();
    await control.close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logError(logger, err, { event: "SHUTDOWN_FAILED" });
          process.exit(1);
        });
    });
  }
}

main().catch((err) => {
  logError(logger, err);
  process.exit(1);
});
