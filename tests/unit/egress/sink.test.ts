import { EgressSink } from "../../../src/egress/sink";
import type { LocalPlayer } from "../../../src/egress/local-player";
import type { PcmFormat } from "../../../src/egress/types";
import type { AudioArtifact } from "../../../src/speech/synthesizer";
import { RecordingSink } from "../../helpers/fixtures";
import { FakeFeed } from "../../helpers/fakes";

function artifact(durationSec: number | null): AudioArtifact {
  return { key: "k1", path: "/cache/k1.wav", durationSec, cached: false, bytes: 100 };
}

function makeSink(opts: {
  feed?: FakeFeed | null;
  player?: LocalPlayer | null;
  probe?: (p: string) => Promise<number | null>;
  graceMs?: number;
}) {
  const events = new RecordingSink();
  const decoded: { path: string; format: PcmFormat }[] = [];
  const sink = new EgressSink({
    feeds: { activeFeed: () => opts.feed ?? null },
    events,
    player: opts.player ?? null,
    ffmpegPath: "ffmpeg",
    ffprobePath: "ffprobe",
    graceMs: opts.graceMs,
    probe: opts.probe ?? (async () => null),
    decode: async (path, format) => {
      decoded.push({ path, format });
      return Buffer.alloc(480);
    },
  });
  return { sink, events, decoded };
}

describe("EgressSink", () => {
  it("estimates the duration for a missing artifact", async () => {
    const { sink, events } = makeSink({});
    const result = await sink.emit(null, "Only a few words");
    expect(result.durationSec).toBe(3);
    expect(result.outputs).toEqual([]);
    expect(events.events).toHaveLength(0);
  });

  it("pushes decoded PCM to a running feed", async () => {
    const feed = new FakeFeed();
    feed.start();
    const { sink, decoded } = makeSink({ feed });

    const result = await sink.emit(artifact(2), "Hello");

    expect(result).toMatchObject({ durationSec: 2, outputs: ["stream"] });
    expect(decoded).toEqual([{ path: "/cache/k1.wav", format: feed.format }]);
    expect(feed.pushed).toHaveLength(1);
  });

  it("skips a feed that is not running", async () => {
    const feed = new FakeFeed();
    const { sink } = makeSink({ feed });
    const result = await sink.emit(artifact(2), "Hello");
    expect(result.outputs).toEqual([]);
    expect(feed.pushed).toHaveLength(0);
  });

  it("probes when the artifact has no header duration and estimates when probing fails", async () => {
    const probed = makeSink({ probe: async () => 4.5 });
    expect((await probed.sink.emit(artifact(null), "Hello")).durationSec).toBe(4.5);

    const failing = makeSink({
      probe: async () => {
        throw new Error("ffprobe missing");
      },
    });
    expect((await failing.sink.emit(artifact(null), "Hello")).durationSec).toBe(3);
  });

  it("plays locally and reports a failing player as a warning", async () => {
    const play = jest.fn(async () => {});
    const ok = makeSink({ player: { play } });
    expect((await ok.sink.emit(artifact(1), "Hi")).outputs).toEqual(["local"]);
    expect(play).toHaveBeenCalledWith("/cache/k1.wav", 16_000);

    const broken = makeSink({
      player: {
        play: async () => {
          throw new Error("no audio device");
        },
      },
    });
    const result = await broken.sink.emit(artifact(1), "Hi");
    expect(result.outputs).toEqual([]);
    expect(broken.events.events).toEqual([{ kind: "stream_warning", data: { message: "local output failed: no audio device" } }]);
  });

  it("gives up on a stalled feed after duration plus grace", async () => {
    const feed = new FakeFeed();
    feed.start();
    feed.pushImpl = () => new Promise<void>(() => {});
    const { sink, events } = makeSink({ feed, graceMs: 10 });

    const result = await sink.emit(artifact(0.01), "Hi");

    expect(result.outputs).toEqual([]);
    expect(events.events).toEqual([
      { kind: "stream_warning", data: { message: "stream output failed: egress stream timed out after 20ms" } },
    ]);
  });
});
