import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createConfig, getConfig } from '../config/index.js';
import { AuthService } from '../services/AuthService.js';
import { InputService } from '../services/InputService.js';
import { WorkflowService } from '../services/WorkflowService.js';
import { ValidationError } from '../types/errors.js';
import { createPlaylistFromFile } from './commands.js';
import { promptPlaylistName } from './prompt.js';

const fakes = vi.hoisted(() => {
  const order: string[] = [];
  return {
    order,
    authenticate: vi.fn(async () => {
      order.push('authenticate');
    }),
    getCurrentUser: vi.fn(async () => {
      order.push('currentUser');
      return { id: 'user-1', displayName: 'Test User' };
    }),
    readSongFile: vi.fn(async () => {
      order.push('read');
      return { requests: [], malformed: [] };
    }),
    promptPlaylistName: vi.fn(async () => {
      order.push('prompt');
      return 'Prompted Mix';
    }),
    run: vi.fn(async () => {
      order.push('run');
    }),
  };
});

vi.mock('spotify-web-api-node', () => ({ default: vi.fn() }));

vi.mock('../config/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../config/index.js')>()),
  getConfig: vi.fn(),
}));

vi.mock('../services/AuthService.js', () => ({
  AuthService: vi.fn(function () {
    return { authenticate: fakes.authenticate };
  }),
}));

vi.mock('../services/SpotifyService.js', () => ({
  SpotifyService: vi.fn(function () {
    return { getCurrentUser: fakes.getCurrentUser };
  }),
}));

vi.mock('../services/InputService.js', () => ({
  InputService: { readSongFile: fakes.readSongFile },
}));

vi.mock('../services/WorkflowService.js', () => ({
  WorkflowService: vi.fn(function () {
    return { run: fakes.run };
  }),
}));

vi.mock('./prompt.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./prompt.js')>()),
  promptPlaylistName: fakes.promptPlaylistName,
}));

const env = { SPOTIFY_CLIENT_ID: 'test-client', SPOTIFY_CLIENT_SECRET: 'test-secret' };

describe('createPlaylistFromFile', () => {
  beforeEach(() => {
    fakes.order.length = 0;
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.mocked(getConfig).mockReturnValue(createConfig(env));
  });

  it('reads the file, authenticates, looks up the user, prompts, then runs the workflow', async () => {
    await createPlaylistFromFile('songs.txt', {});

    expect(fakes.order).toEqual(['read', 'authenticate', 'currentUser', 'prompt', 'run']);
    expect(InputService.readSongFile).toHaveBeenCalledWith('songs.txt');
    expect(AuthService).toHaveBeenCalledWith(expect.anything(), getConfig().spotify);
    expect(WorkflowService).toHaveBeenCalledTimes(1);
    expect(fakes.run).toHaveBeenCalledWith(
      { requests: [], malformed: [] },
      expect.objectContaining({
        playlistName: 'Prompted Mix',
        public: true,
        dryRun: false,
        batchSize: 100,
      })
    );
  });

  it('uses --name without prompting', async () => {
    await createPlaylistFromFile('songs.txt', { name: '  Road Trip ' });

    expect(promptPlaylistName).not.toHaveBeenCalled();
    expect(fakes.order).toEqual(['read', 'authenticate', 'currentUser', 'run']);
    expect(fakes.run).toHaveBeenCalledWith(
      expect.anything(),
      expect.objectContaining({ playlistName: 'Road Trip' })
    );
  });

  it('rejects an empty --name instead of prompting', async () => {
    await expect(createPlaylistFromFile('songs.txt', { name: '' })).rejects.toBeInstanceOf(
      ValidationError
    );

    expect(promptPlaylistName).not.toHaveBeenCalled();
    expect(fakes.run).not.toHaveBeenCalled();
  });

  it('turns on dry-run from the environment', async () => {
    vi.mocked(getConfig).mockReturnValue(createConfig({ ...env, DRY_RUN: 'true' }));

    await createPlaylistFromFile('songs.txt', { name: 'Road Trip', dryRun: false });

    expect(fakes.run).toHaveBeenCalledWith(
      expect.anything(),
      expect.objectContaining({ dryRun: true })
    );
  });

  it('passes command-line options over config defaults', async () => {
    await createPlaylistFromFile('lists/mine.txt', {
      name: 'Road Trip',
      description: 'test playlist',
      private: true,
      dryRun: true,
      batchSize: 25,
    });

    expect(InputService.readSongFile).toHaveBeenCalledWith('lists/mine.txt');
    expect(fakes.run).toHaveBeenCalledWith(expect.anything(), {
      playlistName: 'Road Trip',
      description: 'test playlist',
      public: false,
      dryRun: true,
      batchSize: 25,
    });
  });

  it('stops before searching when authentication fails', async () => {
    fakes.authenticate.mockRejectedValueOnce(new Error('denied'));

    await expect(createPlaylistFromFile('songs.txt', { name: 'Road Trip' })).rejects.toThrow(
      'denied'
    );
    expect(fakes.getCurrentUser).not.toHaveBeenCalled();
    expect(fakes.run).not.toHaveBeenCalled();
  });
});
