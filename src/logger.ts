/* --------------------------------------------------------------------------
 *  Hunkwright — Shared Output Channels (Singleton)
 * ----------------------------------------------------------------------- */

export type ChannelSink = (line: string, channel: string) => void;

/**
 * Named, append-only transcript. Every line is kept in memory and
 * forwarded to the registered sinks.
 */
export class OutputChannel {
  private readonly transcript: string[] = [];
  private readonly sinks = new Set<ChannelSink>();

  constructor(readonly name: string) {}

  appendLine(message: string): void {
    this.transcript.push(message);
    for (const sink of this.sinks) {
      sink(message, this.name);
    }
  }

  /**
   * Registers a sink; returns a function that removes it again.
   */
  addSink(sink: ChannelSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  lines(): readonly string[] {
    return this.transcript;
  }

  clear(): void {
    this.transcript.length = 0;
  }
}

let _mainChannel: OutputChannel | undefined;
let _fsChannel: OutputChannel | undefined;

export function getMainOutputChannel(): OutputChannel {
  _mainChannel ??= new OutputChannel('Hunkwright');
  return _mainChannel;
}

export function getFileOutputChannel(): OutputChannel {
  _fsChannel ??= new OutputChannel('Hunkwright Files');
  return _fsChannel;
}

/** Appends a line to the main channel */
export function log(message: string): void {
  getMainOutputChannel().appendLine(message);
}

/** Drops both channels; the next getter call creates fresh ones. */
export function resetLoggers(): void {
  _mainChannel = undefined;
  _fsChannel = undefined;
}
