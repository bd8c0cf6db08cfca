/**
 * Typebox schemas for the files the builder reads.
 *
 * Only the fields the builder relies on are described; everything else in
 * package.json / package-lock.json passes through untouched.
 */

import { Type, type Static } from "@sinclair/typebox";

const RangeMap = Type.Record(Type.String(), Type.String());

export const PackageManifestSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  version: Type.Optional(Type.String()),
  dependencies: Type.Optional(RangeMap),
  devDependencies: Type.Optional(RangeMap),
  engines: Type.Optional(RangeMap),
  packageManager: Type.Optional(Type.String({ minLength: 1 })),
});

export type PackageManifestSchema = Static<typeof PackageManifestSchema>;

export const LockEntrySchema = Type.Object({
  name: Type.Optional(Type.String()),
  version: Type.Optional(Type.String()),
  resolved: Type.Optional(Type.String()),
  integrity: Type.Optional(Type.String()),
  dev: Type.Optional(Type.Boolean()),
  optional: Type.Optional(Type.Boolean()),
  devOptional: Type.Optional(Type.Boolean()),
  link: Type.Optional(Type.Boolean()),
  dependencies: Type.Optional(RangeMap),
  devDependencies: Type.Optional(RangeMap),
  engines: Type.Optional(Type.Union([RangeMap, Type.Array(Type.String())])),
});

export const LockFileSchema = Type.Object({
  name: Type.Optional(Type.String()),
  version: Type.Optional(Type.String()),
  lockfileVersion: Type.Integer({ minimum: 1 }),
  packages: Type.Record(Type.String(), LockEntrySchema),
});

export type LockFileSchema = Static<typeof LockFileSchema>;
