import { ActivityType } from '../../models/Activity';
import { ErrorCode, GatewayEncodeError } from '../../models/ErrorTypes';
import { ChannelType } from '../../models/Ready';
import { activityTypeCodec } from '../ActivityCodec';
import { createEnumCodec } from '../EnumCodec';
import { channelTypeCodec } from '../ReadyCodec';

describe('EnumCodec', () => {
  describe('activityTypeCodec.decode', () => {
    it('should map every published code to its variant', () => {
      expect(activityTypeCodec.decode(0)).toBe(ActivityType.Playing);
      expect(activityTypeCodec.decode(1)).toBe(ActivityType.Streaming);
      expect(activityTypeCodec.decode(2)).toBe(ActivityType.Listening);
      expect(activityTypeCodec.decode(3)).toBe(ActivityType.Watching);
      expect(activityTypeCodec.decode(4)).toBe(ActivityType.Custom);
      expect(activityTypeCodec.decode(5)).toBe(ActivityType.Competing);
    });

    it('should return Unknown for codes outside the published range', () => {
      expect(activityTypeCodec.decode(6)).toBe(ActivityType.Unknown);
      expect(activityTypeCodec.decode(-1)).toBe(ActivityType.Unknown);
      expect(activityTypeCodec.decode(4294967295)).toBe(ActivityType.Unknown);
      expect(activityTypeCodec.decode(Number.MAX_SAFE_INTEGER)).toBe(ActivityType.Unknown);
      expect(activityTypeCodec.decode(2.5)).toBe(ActivityType.Unknown);
    });

    it('should never throw', () => {
      for (let code = -10; code < 50; code++) {
        expect(() => activityTypeCodec.decode(code)).not.toThrow();
      }
    });
  });

  describe('activityTypeCodec.decodeOptional', () => {
    it('should default to Playing when the field is absent', () => {
      expect(activityTypeCodec.decodeOptional(undefined)).toBe(ActivityType.Playing);
      expect(activityTypeCodec.decodeOptional(null)).toBe(ActivityType.Playing);
    });

    it('should decode present codes normally', () => {
      expect(activityTypeCodec.decodeOptional(5)).toBe(ActivityType.Competing);
      expect(activityTypeCodec.decodeOptional(42)).toBe(ActivityType.Unknown);
    });
  });

  describe('activityTypeCodec.encode', () => {
    it('should return the wire code for named variants', () => {
      expect(activityTypeCodec.encode(ActivityType.Playing)).toBe(0);
      expect(activityTypeCodec.encode(ActivityType.Watching)).toBe(3);
      expect(activityTypeCodec.encode(ActivityType.Competing)).toBe(5);
    });

    it('should reject the Unknown variant', () => {
      expect(() => activityTypeCodec.encode(ActivityType.Unknown)).toThrow(GatewayEncodeError);

      let caught: unknown;
      try {
        activityTypeCodec.encode(ActivityType.Unknown, 'type');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(GatewayEncodeError);
      expect(caught).toMatchObject({ code: ErrorCode.UNSUPPORTED_ENCODING, field: 'type' });
    });
  });

  describe('createEnumCodec', () => {
    enum Shade {
      Light = 0,
      Dark = 1,
      Unknown = -1
    }

    const shadeCodec = createEnumCodec<Shade>('Shade', [Shade.Light, Shade.Dark], Shade.Unknown);

    it('should use the first declared variant as the default', () => {
      expect(shadeCodec.defaultValue).toBe(Shade.Light);
      expect(shadeCodec.unknownValue).toBe(Shade.Unknown);
      expect(shadeCodec.name).toBe('Shade');
    });

    it('should report which variants have a wire code', () => {
      expect(shadeCodec.isKnown(Shade.Dark)).toBe(true);
      expect(shadeCodec.isKnown(Shade.Unknown)).toBe(false);
    });
  });

  describe('channelTypeCodec', () => {
    it('should decode private channel kinds and tolerate new ones', () => {
      expect(channelTypeCodec.decode(1)).toBe(ChannelType.Private);
      expect(channelTypeCodec.decode(3)).toBe(ChannelType.GroupDm);
      expect(channelTypeCodec.decode(15)).toBe(ChannelType.Unknown);
    });
  });
});
