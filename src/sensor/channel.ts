/**
 * Metric channel. A named value slot with descriptive attributes (unit, limits, lookup table, display flags).
 */

import { InputValidationError } from '../errors.js';
import {
  CHANNEL_ATTRIBUTES,
  type ChannelAttribute,
  type ChannelAttributes,
  CUSTOM_UNIT,
  isChannelAttribute,
} from '../schemas/channel.js';

/** Rendered channel: tag name to text, in output order. */
export type ChannelEntry = Record<string, string>;

/** Metric channel interface. */
export interface Channel {
  /** Channel name, unique within a sensor. */
  readonly name: string;
  /** Set the channel value. Fails when empty. */
  setValue(value: string | number): void;
  /** Current value, if set. */
  getValue(): string | undefined;
  /** Whether a value has been set. */
  hasValue(): boolean;
  /** Display the value through a lookup table; forces the unit to `Custom`. */
  setLookup(id: string): void;
  /** Set one attribute by name. */
  setAttribute(name: string, value: string): void;
  /** Set several attributes; each is validated as by {@link Channel.setAttribute}. Undefined entries are skipped. */
  setAttributes(attributes: Readonly<Record<string, string | undefined>>): void;
  /** Current attribute value, if set. */
  getAttribute(name: string): string | undefined;
  /** Name, value, then every non-empty attribute. */
  render(): ChannelEntry;
}

function assertAttributeName(name: string): ChannelAttribute {
  if (name === 'Name' || name === 'Value') {
    throw new InputValidationError(
      `'${name}' is not a channel attribute; use the dedicated accessor`,
    );
  }
  if (!isChannelAttribute(name)) {
    throw new InputValidationError(`Unknown channel attribute '${name}'`);
  }
  return name;
}

/** Create a metric channel. */
export function createChannel(name: string): Channel {
  if (name.trim() === '') {
    throw new InputValidationError('Channel name must not be empty');
  }

  let value: string | undefined;
  const attributes: ChannelAttributes = {};

  function store(attribute: ChannelAttribute) {
    return (next: string): void => {
      attributes[attribute] = next;
    };
  }

  const setters: Record<ChannelAttribute, (next: string) => void> = {
    // A lookup table pins the unit to Custom.
    Unit: (next) => {
      attributes.Unit =
        attributes.ValueLookup === undefined ? next : CUSTOM_UNIT;
    },
    CustomUnit: store('CustomUnit'),
    SpeedSize: store('SpeedSize'),
    VolumeSize: store('VolumeSize'),
    SpeedTime: store('SpeedTime'),
    Mode: store('Mode'),
    Float: store('Float'),
    DecimalMode: store('DecimalMode'),
    Warning: store('Warning'),
    ShowChart: store('ShowChart'),
    ShowTable: store('ShowTable'),
    LimitMaxError: store('LimitMaxError'),
    LimitMaxWarning: store('LimitMaxWarning'),
    LimitMinWarning: store('LimitMinWarning'),
    LimitMinError: store('LimitMinError'),
    LimitErrorMsg: store('LimitErrorMsg'),
    LimitWarningMsg: store('LimitWarningMsg'),
    LimitMode: store('LimitMode'),
    ValueLookup: (id) => {
      channel.setLookup(id);
    },
    NotifyChanged: store('NotifyChanged'),
  };

  const channel: Channel = {
    name,

    setValue(next: string | number): void {
      const text = typeof next === 'number' ? String(next) : next;
      if (text === '') {
        throw new InputValidationError(
          `Value for channel '${name}' must not be empty`,
        );
      }
      value = text;
    },

    getValue: () => value,

    hasValue: () => value !== undefined,

    setLookup(id: string): void {
      if (id === '') {
        throw new InputValidationError(
          `Lookup id for channel '${name}' must not be empty`,
        );
      }
      attributes.ValueLookup = id;
      attributes.Unit = CUSTOM_UNIT;
    },

    setAttribute(attributeName: string, next: string): void {
      const attribute = assertAttributeName(attributeName);
      if (next === '') {
        throw new InputValidationError(
          `Attribute '${attribute}' of channel '${name}' must not be empty`,
        );
      }
      setters[attribute](next);
    },

    setAttributes(next: Readonly<Record<string, string | undefined>>): void {
      for (const [attributeName, attributeValue] of Object.entries(next)) {
        if (attributeValue !== undefined) {
          channel.setAttribute(attributeName, attributeValue);
        }
      }
    },

    getAttribute(attributeName: string): string | undefined {
      return attributes[assertAttributeName(attributeName)];
    },

    render(): ChannelEntry {
      const entry: ChannelEntry = { channel: name, value: value ?? '' };
      for (const attribute of CHANNEL_ATTRIBUTES) {
        const attributeValue = attributes[attribute];
        if (attributeValue !== undefined && attributeValue !== '') {
          entry[attribute.toLowerCase()] = attributeValue;
        }
      }
      return entry;
    },
  };

  return channel;
}
