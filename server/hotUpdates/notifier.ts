import { EventEmitter } from "node:events";

import type { ContentSwitchEvent, ContentSwitchNotifier, DownloadProgress, Version } from "./types.js";

const CONTENT_SWITCH_EVENT = "content-switch";
const DOWNLOAD_PROGRESS_EVENT = "download-progress";

export type ContentSwitchListener = (event: ContentSwitchEvent) => void;

export interface DownloadProgressEvent extends DownloadProgress {
  version: Version;
}

export type DownloadProgressListener = (event: DownloadProgressEvent) => void;

export class ContentSwitchBroadcaster implements ContentSwitchNotifier {
  private readonly emitter = new EventEmitter();
  private lastEvent: ContentSwitchEvent | null = null;

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  notify(event: ContentSwitchEvent): void {
    this.lastEvent = { ...event };
    this.emitter.emit(CONTENT_SWITCH_EVENT, { ...event });
  }

  subscribe(listener: ContentSwitchListener): () => void {
    this.emitter.on(CONTENT_SWITCH_EVENT, listener);
    return () => {
      this.emitter.off(CONTENT_SWITCH_EVENT, listener);
    };
  }

  publishProgress(version: Version, progress: DownloadProgress): void {
    this.emitter.emit(DOWNLOAD_PROGRESS_EVENT, { version, ...progress });
  }

  subscribeProgress(listener: DownloadProgressListener): () => void {
    this.emitter.on(DOWNLOAD_PROGRESS_EVENT, listener);
    return () => {
      this.emitter.off(DOWNLOAD_PROGRESS_EVENT, listener);
    };
  }

  getLastEvent(): ContentSwitchEvent | null {
    return this.lastEvent ? { ...this.lastEvent } : null;
  }

  listenerCount(): number {
    return this.emitter.listenerCount(CONTENT_SWITCH_EVENT) + this.emitter.listenerCount(DOWNLOAD_PROGRESS_EVENT);
  }
}
