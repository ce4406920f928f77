import type { MatchResult, PlaylistBuildReport, SongRequest } from '../types/index.js';

export type ReportSink = (line: string) => void;

export function formatSong(request: SongRequest): string {
  return `${request.artist} - ${request.title}`;
}

/** User-facing progress output. Holds no state between calls. */
export class ReportService {
  constructor(private readonly write: ReportSink = (line) => console.log(line)) {}

  start(total: number, malformedCount: number): void {
    this.write(`\n🎵 Starting to add ${total} songs to your playlist...`);
    if (malformedCount > 0) {
      this.write(`⚠️  Skipping ${malformedCount} malformed line(s)`);
    }
  }

  playlistCreated(name: string, dryRun: boolean): void {
    this.write(
      dryRun ? `📝 [DRY RUN] Would create playlist: '${name}'` : `📝 Created playlist: '${name}'`
    );
  }

  progress(index: number, total: number, request: SongRequest): void {
    this.write(`📍 Processing (${index}/${total}): ${formatSong(request)}`);
  }

  found(result: MatchResult): void {
    if (!result.track) return;
    this.write(`  ✅ Found: ${result.track.name} by ${result.track.artists.join(', ')}`);
  }

  notFound(request: SongRequest): void {
    this.write(`  ❌ Could not find: ${formatSong(request)}`);
  }

  batchSubmitted(index: number, count: number, size: number, dryRun: boolean): void {
    const prefix = dryRun ? '[DRY RUN] Would add' : 'Added';
    this.write(`💫 ${prefix} batch ${index}/${count} (${size} tracks)`);
  }

  summary(report: PlaylistBuildReport): void {
    const total = report.matched.length + report.unmatched.length;
    this.write(`\n📊 Matched ${report.matched.length}/${total} songs`);

    if (report.unmatched.length > 0) {
      this.write("\n⚠️ The following songs couldn't be found:");
      for (const request of report.unmatched) {
        this.write(`  - ${formatSong(request)}`);
      }
    }

    if (report.malformed.length > 0) {
      this.write('\n⚠️ The following lines were skipped (expected "Artist - Title"):');
      for (const error of report.malformed) {
        this.write(`  - line ${error.lineNumber}: ${error.line}`);
      }
    }

    if (report.dryRun) {
      this.write('\n🧪 Dry run complete, no playlist was created.');
      return;
    }

    this.write('\n🎉 Playlist created successfully! 🎉');
    this.write(`🔗 Playlist URL: ${report.playlistUrl}`);
  }
}
