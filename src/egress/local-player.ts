/**
 * Local playback through ffplay (no window, exits at end of file).
 */

import { runProcess } from "../utils/process";

export interface LocalPlayer {
  play(filePath: string, timeoutMs: number): Promise<void>;
}

export class FfplayPlayer implements LocalPlayer {
  constructor(private readonly ffplayPath: string) {}

  async play(filePath: string, timeoutMs: number): Promise<void> {
    const result = await runProcess(this.ffplayPath, ["-nodisp", "-autoexit", "-loglevel", "error", filePath], {
      timeoutMs,
      label: "ffplay",
    });
    if (result.code !== 0) {
      throw new Error(`ffplay exited with code ${result.code}: ${result.stderr.trim()}`);
    }
  }
}
