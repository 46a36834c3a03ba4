import { z } from 'zod';
import { MAX_CUSTOM_TYPE } from '../domain/vocabulary.js';
import { CUSTOM_OBJECT_MARKERS } from '../domain/world-objects.js';

const marker = z.enum(CUSTOM_OBJECT_MARKERS);
const millimetres = z.number().positive().finite();

const markerSize = {
  markerWidthMm: millimetres,
  markerHeightMm: millimetres,
  isUnique: z.boolean().default(true),
};

/**
 * Definition of a custom marker object, validated before it is bound to a
 * custom type number. A box must use six distinct markers.
 */
export const customArchetypeSchema = z
  .discriminatedUnion('shape', [
    z.object({
      shape: z.literal('box'),
      markerFront: marker,
      markerBack: marker,
      markerTop: marker,
      markerBottom: marker,
      markerLeft: marker,
      markerRight: marker,
      depthMm: millimetres,
      widthMm: millimetres,
      heightMm: millimetres,
      ...markerSize,
    }),
    z.object({
      shape: z.literal('cube'),
      marker,
      sizeMm: millimetres,
      ...markerSize,
    }),
    z.object({
      shape: z.literal('wall'),
      marker,
      widthMm: millimetres,
      heightMm: millimetres,
      ...markerSize,
    }),
  ])
  .superRefine((archetype, ctx) => {
    if (archetype.shape !== 'box') return;
    const markers = [
      archetype.markerFront,
      archetype.markerBack,
      archetype.markerTop,
      archetype.markerBottom,
      archetype.markerLeft,
      archetype.markerRight,
    ];
    if (new Set(markers).size !== markers.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Box sides must use distinct markers' });
    }
  });

export type CustomArchetypeInput = z.input<typeof customArchetypeSchema>;

export const customTypeSchema = z.number().int().min(1).max(MAX_CUSTOM_TYPE);
