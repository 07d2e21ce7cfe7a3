import { Activity, ActivityType } from '../../models/Activity';
import { ErrorCode, GatewayDecodeError, GatewayEncodeError } from '../../models/ErrorTypes';
import { ActivityFlags } from '../../models/Flags';
import { decodeActivity, encodeActivity } from '../ActivityCodec';

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('ActivityCodec', () => {
  const richActivity = {
    application_id: '383226320970055681',
    assets: {
      large_image: 'large-key',
      large_text: 'Editing a file',
      small_image: null,
      small_text: 'Code'
    },
    details: 'Editing index.ts',
    flags: 3,
    instance: true,
    type: 0,
    name: 'Code Editor',
    party: { id: 'party-1', size: [2, 4] },
    secrets: { join: 'join-secret', match: 'match-secret', spectate: null },
    state: 'Workspace: app',
    timestamps: { start: 1640995200000 },
    buttons: ['Open Repository'],
    created_at: 1640995200000
  };

  describe('decodeActivity', () => {
    it('should decode a rich presence activity', () => {
      const activity = decodeActivity(richActivity);

      expect(activity).toEqual({
        applicationId: '383226320970055681',
        assets: {
          largeImage: 'large-key',
          largeText: 'Editing a file',
          smallText: 'Code'
        },
        details: 'Editing index.ts',
        flags: ActivityFlags.of('INSTANCE', 'JOIN'),
        instance: true,
        kind: ActivityType.Playing,
        name: 'Code Editor',
        party: { id: 'party-1', size: [2, 4] },
        secrets: { join: 'join-secret', match: 'match-secret' },
        state: 'Workspace: app',
        timestamps: { start: 1640995200000 },
        buttons: [{ label: 'Open Repository', url: '' }]
      });
    });

    it('should default the kind to Playing when type is absent', () => {
      expect(decodeActivity({ name: 'Game' }).kind).toBe(ActivityType.Playing);
    });

    it('should decode unrecognized types to Unknown', () => {
      expect(decodeActivity({ name: 'Future', type: 42 }).kind).toBe(ActivityType.Unknown);
    });

    it('should default buttons to an empty list', () => {
      expect(decodeActivity({ name: 'Game' }).buttons).toEqual([]);
      expect(decodeActivity({ name: 'Game', buttons: null }).buttons).toEqual([]);
    });

    it('should decode button objects', () => {
      const activity = decodeActivity({
        name: 'Stream',
        type: 1,
        url: 'https://twitch.tv/example',
        buttons: [{ label: 'Watch', url: 'https://twitch.tv/example' }]
      });

      expect(activity.kind).toBe(ActivityType.Streaming);
      expect(activity.url).toBe('https://twitch.tv/example');
      expect(activity.buttons).toEqual([{ label: 'Watch', url: 'https://twitch.tv/example' }]);
    });

    it('should decode the custom status emoji', () => {
      const activity = decodeActivity({
        name: 'Custom Status',
        type: 4,
        state: 'Out to lunch',
        emoji: { name: 'sandwich', id: null }
      });

      expect(activity.kind).toBe(ActivityType.Custom);
      expect(activity.emoji).toEqual({ name: 'sandwich' });
    });

    it('should keep empty free-text fields', () => {
      const activity = decodeActivity({
        name: '',
        type: 4,
        state: '',
        details: '',
        emoji: { name: '' },
        assets: { large_text: '' }
      });

      expect(activity.name).toBe('');
      expect(activity.state).toBe('');
      expect(activity.details).toBe('');
      expect(activity.emoji).toEqual({ name: '' });
      expect(activity.assets?.largeText).toBe('');
    });

    it('should fail when the name is missing', () => {
      const error = captureError(() => decodeActivity({ type: 0 }));

      expect(error).toBeInstanceOf(GatewayDecodeError);
      expect(error).toMatchObject({
        code: ErrorCode.MISSING_REQUIRED_FIELD,
        details: [{ field: 'name', rule: 'any.required' }]
      });
    });

    it('should fail on a button that is neither a string nor an object', () => {
      const error = captureError(() => decodeActivity({ name: 'Game', buttons: [42] }));

      expect(error).toBeInstanceOf(GatewayDecodeError);
      expect(error).toMatchObject({ code: ErrorCode.STRUCTURAL_DECODE_ERROR });
    });

    it('should fail when type is not a number', () => {
      const error = captureError(() => decodeActivity({ name: 'Game', type: 'playing' }));

      expect(error).toMatchObject({
        code: ErrorCode.STRUCTURAL_DECODE_ERROR,
        details: [{ field: 'type', rule: 'number.base' }]
      });
    });
  });

  describe('encodeActivity', () => {
    it('should write every optional field as null', () => {
      expect(encodeActivity(Activity.playing('Chess'))).toEqual({
        application_id: null,
        assets: null,
        details: null,
        flags: null,
        instance: null,
        type: 0,
        name: 'Chess',
        party: null,
        secrets: null,
        state: null,
        emoji: null,
        timestamps: null,
        sync_id: null,
        session_id: null,
        url: null,
        buttons: []
      });
    });

    it('should write the stream url and wire field names', () => {
      const wire = encodeActivity(Activity.streaming('Speedrun', 'https://twitch.tv/example'));

      expect(wire.type).toBe(1);
      expect(wire.url).toBe('https://twitch.tv/example');
    });

    it('should write secrets under match', () => {
      const wire = encodeActivity(decodeActivity(richActivity));

      expect(wire.secrets).toEqual({ join: 'join-secret', match: 'match-secret', spectate: null });
      expect(wire.assets).toEqual({
        large_image: 'large-key',
        large_text: 'Editing a file',
        small_image: null,
        small_text: 'Code'
      });
      expect(wire.flags).toBe(3);
      expect(wire.buttons).toEqual([{ label: 'Open Repository', url: '' }]);
    });

    it('should refuse to encode an Unknown kind', () => {
      const activity = decodeActivity({ name: 'Future', type: 99 });

      expect(() => encodeActivity(activity)).toThrow(GatewayEncodeError);
    });
  });
});
