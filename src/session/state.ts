/**
 * Shared per-session metadata. Titles are keyed by url so the player UI can
 * show something better than the raw link for queued tracks.
 */
export class SessionState {
  private readonly titles = new Map<string, string>();

  getTitle(url: string): string | undefined {
    return this.titles.get(url);
  }

  setTitle(url: string, title: string): void {
    this.titles.set(url, title);
  }

  get size(): number {
    return this.titles.size;
  }
}
