import type { ActivityButton } from '../models/Activity';
import { GatewayDecodeError } from '../models/ErrorTypes';
import type { WireActivityButton } from '../models/WireTypes';

/**
 * One accepted wire shape for a button element
 */
interface ButtonShape {
  name: string;
  decode(element: unknown): ActivityButton | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shapes are tried in order; the first match wins
 */
const BUTTON_SHAPES: readonly ButtonShape[] = [
  {
    // Legacy: the label alone, the URL is never exposed
    name: 'label',
    decode: element => (typeof element === 'string' ? { label: element, url: '' } : undefined)
  },
  {
    name: 'object',
    decode: element => {
      if (!isRecord(element)) {
        return undefined;
      }
      const { label, url } = element;
      if (typeof label !== 'string') {
        return undefined;
      }
      if (url === undefined || url === null) {
        return { label, url: '' };
      }
      return typeof url === 'string' ? { label, url } : undefined;
    }
  }
];

/**
 * Normalize the `buttons` field of an activity.
 * Absent or null means no buttons.
 */
export function decodeButtons(value: unknown, field = 'buttons'): ActivityButton[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw GatewayDecodeError.structural(field, 'array.base', `${field} must be an array`, value);
  }

  return value.map((element: unknown, index) => {
    for (const shape of BUTTON_SHAPES) {
      const button = shape.decode(element);
      if (button) {
        return button;
      }
    }

    const shapes = BUTTON_SHAPES.map(shape => shape.name).join(' or ');
    throw GatewayDecodeError.structural(
      `${field}[${index}]`,
      'button.shape',
      `${field}[${index}] must be a ${shapes} button`,
      element
    );
  });
}

/**
 * Buttons are always written in the object shape
 */
export function encodeButtons(buttons: readonly ActivityButton[]): WireActivityButton[] {
  return buttons.map(({ label, url }) => ({ label, url }));
}
