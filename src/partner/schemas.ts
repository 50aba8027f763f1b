/**
 * TypeBox schemas for partner API responses
 */

import { Type, type Static } from "@sinclair/typebox";

const NullableString = Type.Union([Type.String(), Type.Null()]);

// List items are cleaned per entry; a bad item never rejects the record
const StringOrList = Type.Union([
  Type.String(),
  Type.Array(Type.Unknown()),
  Type.Null(),
]);

export const PartnerUtmSchema = Type.Object({
  utm_medium: Type.Optional(NullableString),
  utm_source: Type.Optional(NullableString),
  utm_campaign: Type.Optional(NullableString),
  utm_content: Type.Optional(NullableString),
  utm_term: Type.Optional(NullableString),
});

export const PartnerUserSchema = Type.Object({
  tg_id: Type.Union([Type.Integer(), Type.String({ pattern: "^-?\\d+$" })]),
  user_id: Type.Optional(Type.Union([Type.Integer(), Type.String()])),
  referer: Type.Optional(NullableString),
  utm: Type.Optional(Type.Union([PartnerUtmSchema, Type.Null()])),
  authorization_date: Type.Optional(NullableString),
  last_visit_date: Type.Optional(NullableString),
  group: Type.Optional(StringOrList),
  courses: Type.Optional(
    Type.Union([
      Type.Record(Type.String(), Type.Unknown()),
      // Empty course maps arrive as []
      Type.Array(Type.Unknown(), { maxItems: 0 }),
      Type.Null(),
    ])
  ),
  lessons: Type.Optional(StringOrList),
});

export type PartnerUser = Static<typeof PartnerUserSchema>;

export const PartnerUsersResponseSchema = Type.Array(Type.Unknown());
