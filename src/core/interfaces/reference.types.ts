export interface Doctor {
  id: string;
  name: string;
  aliases: string[];
  specialty: string;
  branchId: string;
  days: string;
  timeFrom: string;
  timeTo: string;
  phone?: string;
  experienceYears?: number;
  qualifications?: string;
  notes?: string;
}

export interface Branch {
  id: string;
  name: string;
  aliases: string[];
  address: string;
  city: string;
  phone: string;
  hoursWeekdays: string;
  hoursWeekend: string;
  mapsUrl?: string;
}

export interface Service {
  id: string;
  name: string;
  aliases: string[];
  specialty: string;
  description: string;
  priceSar: number | null;
  priceRange?: string;
  branchIds: string[];
  durationMinutes?: number;
  preparationRequired?: string;
  popular: boolean;
}

export interface AvailabilityRow {
  date: string;
  doctorId: string;
  branchId?: string;
  available: boolean;
  note: string;
  lastUpdated?: string;
}

/** Read-only view; rebuilt by the provider, never mutated in place. */
export interface ReferenceSnapshot {
  readonly version: number;
  readonly loadedAt: string;
  readonly doctors: ReadonlyMap<string, Doctor>;
  readonly branches: ReadonlyMap<string, Branch>;
  readonly services: ReadonlyMap<string, Service>;
  /** Keyed by `date|doctorId`. */
  readonly availability: ReadonlyMap<string, AvailabilityRow>;
}
