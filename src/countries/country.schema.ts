import { z } from 'zod';

export const countryNameSchema = z.object({
  common: z.string().min(1),
  official: z.string().min(1),
});

export const countryRecordSchema = z.object({
  name: countryNameSchema,
  independent: z.boolean().nullable().transform((value) => value ?? false),
  cca2: z.string(),
  cca3: z.string().length(3),
  capital: z.array(z.string()).default([]),
  region: z.string(),
  subregion: z.string().default(''),
  languages: z.record(z.string()).default({}),
  borders: z.array(z.string()).default([]),
  area: z.number(),
  flag: z.string().default(''),
});

export const countriesSchema = z.array(countryRecordSchema);

export type CountryRecord = Readonly<z.infer<typeof countryRecordSchema>>;

export type NameVariant = keyof CountryRecord['name'];

export const NAME_VARIANTS: readonly NameVariant[] = ['common', 'official'];
