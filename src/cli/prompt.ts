import { createInterface } from 'readline/promises';
import { PlaylistNameSchema } from '../config/schema.js';
import { ValidationError } from '../types/errors.js';

export async function promptPlaylistName(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = createInterface({ input, output });
  try {
    const answer = await rl.question('\n✨ Enter playlist name: ');
    return parsePlaylistName(answer);
  } finally {
    rl.close();
  }
}

export function parsePlaylistName(value: string): string {
  const result = PlaylistNameSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid playlist name', {
      value,
    });
  }
  return result.data;
}
