/**
 * Channel attribute schema and types.
 *
 * @module
 */

import { z } from 'zod';

/** Descriptive attributes a channel may carry, in render order. `Name` and `Value` are not attributes. */
export const channelAttributeSchema = z.enum([
  'Unit',
  'CustomUnit',
  'SpeedSize',
  'VolumeSize',
  'SpeedTime',
  'Mode',
  'Float',
  'DecimalMode',
  'Warning',
  'ShowChart',
  'ShowTable',
  'LimitMaxError',
  'LimitMaxWarning',
  'LimitMinWarning',
  'LimitMinError',
  'LimitErrorMsg',
  'LimitWarningMsg',
  'LimitMode',
  'ValueLookup',
  'NotifyChanged',
]);

export type ChannelAttribute = z.infer<typeof channelAttributeSchema>;

export const CHANNEL_ATTRIBUTES = channelAttributeSchema.options;

/** Attribute values as accepted from configuration. */
export const channelAttributesSchema = z
  .record(channelAttributeSchema, z.string().min(1))
  .refine((value) => Object.keys(value).length > 0, {
    message: 'At least one channel attribute is required',
  });

export type ChannelAttributes = Partial<Record<ChannelAttribute, string>>;

/** Unit forced onto channels that display through a value lookup. */
export const CUSTOM_UNIT = 'Custom';

/** Whether a name is one of the recognized channel attributes. */
export function isChannelAttribute(name: string): name is ChannelAttribute {
  return channelAttributeSchema.safeParse(name).success;
}
