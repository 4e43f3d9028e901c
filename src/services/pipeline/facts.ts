import type { ClassificationEntities } from '@core/interfaces/classification.types.js';
import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';

const MAX_FACTS = 12;

/**
 * Reference rows an escalation reply may quote: whatever the user mentioned,
 * then branch contact details.
 */
export function buildFacts(snapshot: ReferenceSnapshot | null, entities: ClassificationEntities): string[] {
  if (!snapshot) return [];
  const facts: string[] = [];

  for (const id of entities.doctor?.ids ?? []) {
    const d = snapshot.doctors.get(id);
    if (d) facts.push(`Doctor ${d.name}: ${d.specialty}, ${d.days} ${d.timeFrom}-${d.timeTo}`);
  }
  for (const id of entities.service?.ids ?? []) {
    const s = snapshot.services.get(id);
    if (!s) continue;
    const price = s.priceSar !== null ? `${s.priceSar} SAR` : (s.priceRange ?? 'after consultation');
    facts.push(`Service ${s.name}: ${price}. ${s.description}`.trim());
  }
  for (const b of snapshot.branches.values()) {
    facts.push(`Branch ${b.name} (${b.city}): phone ${b.phone}, weekdays ${b.hoursWeekdays}, weekend ${b.hoursWeekend}`);
  }
  return facts.slice(0, MAX_FACTS);
}
