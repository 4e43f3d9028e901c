import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';
import { parseReferenceData, type ReferenceData, type ReferenceSource } from '@services/reference/reference.source.js';
import { buildSnapshot } from '@services/reference/reference.snapshot.js';

/** Monday 2026-10-19, 12:00 in Riyadh. */
export const FIXED_NOW = new Date('2026-10-19T09:00:00.000Z');

export const referenceDocument = {
  branches: [
    {
      branch_id: 'BR-OLAYA',
      branch_name: 'فرع العليا',
      aliases: ['العليا', 'Olaya'],
      address: 'طريق العليا',
      city: 'الرياض',
      phone: '0110000001',
      hours_weekdays: '9:00 - 22:00',
      hours_weekend: '16:00 - 22:00',
    },
    {
      branch_id: 'BR-NARJIS',
      branch_name: 'فرع النرجس',
      aliases: ['النرجس', 'Narjis'],
      address: 'حي النرجس',
      city: 'الرياض',
      phone: '0110000002',
      hours_weekdays: '10:00 - 22:00',
      hours_weekend: 'مغلق',
    },
  ],
  doctors: [
    {
      doctor_id: 'DR-001',
      doctor_name: 'د. أحمد السالم',
      aliases: ['أحمد السالم', 'Ahmed Alsalem'],
      specialty: 'تقويم الأسنان',
      branch_id: 'BR-OLAYA',
      days: 'الأحد - الخميس',
      time_from: '16:00',
      time_to: '22:00',
    },
    {
      doctor_id: 'DR-002',
      doctor_name: 'د. أحمد القحطاني',
      aliases: ['أحمد القحطاني', 'Ahmed Alqahtani'],
      specialty: 'جراحة الفم',
      branch_id: 'BR-NARJIS',
      days: 'الأحد - الخميس',
      time_from: '10:00',
      time_to: '16:00',
    },
    {
      doctor_id: 'DR-003',
      doctor_name: 'د. سارة العتيبي',
      aliases: ['سارة العتيبي', 'سارة', 'Sara Alotaibi'],
      specialty: 'طب أسنان الأطفال',
      branch_id: 'BR-OLAYA',
      days: 'السبت - الأربعاء',
      time_from: '09:00',
      time_to: '15:00',
    },
  ],
  services: [
    {
      service_id: 'SV-CLEAN',
      service_name: 'تنظيف الأسنان',
      aliases: ['تنظيف', 'cleaning'],
      description: 'تنظيف وإزالة الجير',
      price_sar: 250,
      available_branch_ids: ['BR-OLAYA', 'BR-NARJIS'],
    },
    {
      service_id: 'SV-WHITEN',
      service_name: 'تبييض الأسنان',
      aliases: ['تبييض', 'whitening'],
      description: 'تبييض بالليزر',
      price_sar: '1200',
      available_branch_ids: 'BR-OLAYA',
    },
    {
      service_id: 'SV-BRACES',
      service_name: 'تقويم الأسنان',
      aliases: ['تقويم', 'braces'],
      description: 'تقويم معدني أو شفاف',
      price_sar: null,
      price_range: '6000 - 15000',
      available_branch_ids: ['BR-OLAYA'],
    },
  ],
  availability: [
    { date: '2026-10-19', doctor_id: 'DR-001', available: 'yes', note: 'متواجد من 4 العصر' },
    { date: '2026-10-19', doctor_id: 'DR-002', available: false, note: 'في إجازة' },
  ],
};

export function referenceData(): ReferenceData {
  return parseReferenceData(structuredClone(referenceDocument));
}

export function fixtureSnapshot(version = 1): ReferenceSnapshot {
  return buildSnapshot(referenceData(), version, FIXED_NOW.toISOString());
}

export class StaticReferenceSource implements ReferenceSource {
  loads = 0;

  constructor(private readonly data: () => ReferenceData = referenceData) {}

  async load(): Promise<ReferenceData> {
    this.loads += 1;
    return this.data();
  }
}
