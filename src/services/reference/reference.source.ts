import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';

import { z } from 'zod';

import type { AvailabilityRow, Branch, Doctor, Service } from '@core/interfaces/reference.types.js';

import { ReferenceDataUnavailableError } from '@core/errors/reference-data.error.js';

const list = z
  .union([z.array(z.string()), z.string()])
  .optional()
  .transform((v) => {
    if (v === undefined) return [];
    const items = Array.isArray(v) ? v : v.split(/[;,]/);
    return items.map((s) => s.trim()).filter(Boolean);
  });

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const yesNo = z.union([z.boolean(), z.string()]).transform((v) => {
  if (typeof v === 'boolean') return v;
  return ['1', 'true', 'yes', 'y', 'نعم', 'متاح'].includes(v.trim().toLowerCase());
});

const DoctorRow = z.object({
  doctor_id: z.string().min(1),
  doctor_name: z.string().min(1),
  aliases: list,
  specialty: z.string().default(''),
  branch_id: z.string().min(1),
  days: z.string().default(''),
  time_from: z.string().default(''),
  time_to: z.string().default(''),
  phone: optionalText,
  experience_years: z.coerce.number().int().nonnegative().optional(),
  qualifications: optionalText,
  notes: optionalText,
});

const BranchRow = z.object({
  branch_id: z.string().min(1),
  branch_name: z.string().min(1),
  aliases: list,
  address: z.string().default(''),
  city: z.string().default(''),
  phone: z.string().default(''),
  hours_weekdays: z.string().default(''),
  hours_weekend: z.string().default(''),
  maps_url: optionalText,
});

const ServiceRow = z.object({
  service_id: z.string().min(1),
  service_name: z.string().min(1),
  aliases: list,
  specialty: z.string().default(''),
  description: z.string().default(''),
  price_sar: z.union([z.number(), z.string(), z.null()]).optional().transform((v) => {
    if (v === null || v === undefined || v === '') return null;
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }),
  price_range: optionalText,
  available_branch_ids: list,
  duration_minutes: z.coerce.number().int().positive().optional(),
  preparation_required: optionalText,
  popular: yesNo.default(false),
});

const AvailabilityEntry = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
  doctor_id: z.string().min(1),
  branch_id: optionalText,
  available: yesNo,
  note: z.string().default(''),
  last_updated: optionalText,
});

export const ReferenceFileSchema = z.object({
  doctors: z.array(DoctorRow),
  branches: z.array(BranchRow),
  services: z.array(ServiceRow),
  availability: z.array(AvailabilityEntry).default([]),
});

export interface ReferenceData {
  doctors: Doctor[];
  branches: Branch[];
  services: Service[];
  availability: AvailabilityRow[];
}

export interface ReferenceSource {
  load(): Promise<ReferenceData>;
}

/** Validates a raw reference document and maps it to domain records. */
export function parseReferenceData(input: unknown): ReferenceData {
  const parsed = ReferenceFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ReferenceDataUnavailableError(`Invalid reference data: ${issues}`);
  }
  const raw = parsed.data;
  return {
    doctors: raw.doctors.map((d) => ({
      id: d.doctor_id,
      name: d.doctor_name,
      aliases: d.aliases,
      specialty: d.specialty,
      branchId: d.branch_id,
      days: d.days,
      timeFrom: d.time_from,
      timeTo: d.time_to,
      phone: d.phone,
      experienceYears: d.experience_years,
      qualifications: d.qualifications,
      notes: d.notes,
    })),
    branches: raw.branches.map((b) => ({
      id: b.branch_id,
      name: b.branch_name,
      aliases: b.aliases,
      address: b.address,
      city: b.city,
      phone: b.phone,
      hoursWeekdays: b.hours_weekdays,
      hoursWeekend: b.hours_weekend,
      mapsUrl: b.maps_url,
    })),
    services: raw.services.map((s) => ({
      id: s.service_id,
      name: s.service_name,
      aliases: s.aliases,
      specialty: s.specialty,
      description: s.description,
      priceSar: s.price_sar,
      priceRange: s.price_range,
      branchIds: s.available_branch_ids,
      durationMinutes: s.duration_minutes,
      preparationRequired: s.preparation_required,
      popular: s.popular,
    })),
    availability: raw.availability.map((a) => ({
      date: a.date,
      doctorId: a.doctor_id,
      branchId: a.branch_id,
      available: a.available,
      note: a.note,
      lastUpdated: a.last_updated,
    })),
  };
}

export class FileReferenceSource implements ReferenceSource {
  private readonly path: string;

  constructor(path: string) {
    this.path = isAbsolute(path) ? path : resolve(process.cwd(), path);
  }

  async load(): Promise<ReferenceData> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      throw new ReferenceDataUnavailableError(
        `Cannot read reference data at ${this.path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ReferenceDataUnavailableError(`Reference data at ${this.path} is not valid JSON`);
    }
    return parseReferenceData(json);
  }
}
