import type { TimePort } from "../../ports/sys/TimePort";
import { fromEpochMicros, type Timestamp } from "../../domain/timers/Timestamp";
import { hasFineGrainedClock } from "../../runtime/hires";

export class NodeTime implements TimePort {
  supportsFineGrainedClock(): boolean {
    return hasFineGrainedClock();
  }

  now(fineGrained: boolean): Timestamp {
    if (!fineGrained) {
      return Math.floor(Date.now() / 1000);
    }
    const epochMs = performance.timeOrigin + performance.now();
    return fromEpochMicros(Math.round(epochMs * 1000));
  }
}
