import { readFile } from 'fs/promises';
import { InputFileError, MalformedLineError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { ParsedSongList, SongRequest } from '../types/index.js';

export const SONG_DELIMITER = ' - ';

export class InputService {
  /**
   * Parses one `Artist - Title` line. Only the first delimiter splits, so
   * `A - B - C` is artist `A` with title `B - C`.
   */
  static parseLine(text: string, lineNumber: number): SongRequest {
    const raw = text.trim();
    const index = raw.indexOf(SONG_DELIMITER);
    if (index === -1) {
      throw new MalformedLineError(lineNumber, raw);
    }

    const artist = raw.slice(0, index).trim();
    const title = raw.slice(index + SONG_DELIMITER.length).trim();
    if (!artist || !title) {
      throw new MalformedLineError(lineNumber, raw);
    }

    return Object.freeze({ artist, title, line: lineNumber, raw });
  }

  static parseSongList(text: string): ParsedSongList {
    const requests: SongRequest[] = [];
    const malformed: MalformedLineError[] = [];

    text.split(/\r?\n/).forEach((line, i) => {
      if (!line.trim()) return;

      try {
        requests.push(InputService.parseLine(line, i + 1));
      } catch (error) {
        if (!(error instanceof MalformedLineError)) throw error;
        Logger.warn(`Skipping malformed line ${error.lineNumber}`, { line: error.line });
        malformed.push(error);
      }
    });

    return { requests, malformed };
  }

  static async readSongFile(path: string): Promise<ParsedSongList> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code === 'ENOENT') {
        throw new InputFileError(`${path} file not found`, { path });
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new InputFileError(`Could not read ${path}: ${message}`, { path, code });
    }

    const parsed = InputService.parseSongList(content);
    if (parsed.requests.length === 0) {
      throw new InputFileError(`No "Artist - Title" lines found in ${path}`, {
        path,
        malformed: parsed.malformed.length,
      });
    }

    Logger.debug(`Parsed ${parsed.requests.length} songs from ${path}`, {
      malformed: parsed.malformed.length,
    });
    return parsed;
  }
}
