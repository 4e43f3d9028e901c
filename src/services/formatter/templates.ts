import type { Locale } from '@core/interfaces/message.types.js';

export const MESSAGE_KEYS = [
  'greeting',
  'availability_yes',
  'availability_no',
  'availability_note',
  'schedule',
  'price',
  'price_range',
  'price_on_consultation',
  'price_not_at_branch',
  'doctor_info',
  'doctor_experience',
  'branch_info',
  'branch_maps',
  'service_info',
  'service_duration',
  'service_preparation',
  'list_doctors',
  'list_branches',
  'list_services',
  'list_hours',
  'list_contact',
  'clarify_doctor',
  'clarify_service',
  'clarify_branch',
  'clarify_ambiguous',
  'clarify_not_found',
  'clarify_pick',
  'escalate_fallback',
  'throttled',
  'persistence_error',
  'ask_name',
  'ask_phone',
  'ask_service',
  'ask_branch',
  'ask_date_time',
  'invalid_name',
  'invalid_phone',
  'invalid_service',
  'invalid_branch',
  'invalid_date_time',
  'ambiguous_choice',
  'booking_confirmed',
  'summary_name',
  'summary_phone',
  'summary_service',
  'summary_doctor',
  'booking_with_doctor',
  'summary_branch',
  'summary_when',
  'not_specified',
  'booking_cancelled',
  'booking_timeout',
  'booking_too_many_attempts',
] as const;

export type MessageKey = (typeof MESSAGE_KEYS)[number];

const MESSAGES: Record<Locale, Record<MessageKey, string>> = {
  ar: {
    greeting: 'أهلاً وسهلاً! 👋 كيف أقدر أساعدك؟ تقدر تسأل عن الأسعار، الدكاترة، الفروع، أو تحجز موعد.',
    availability_yes: '✅ {doctor} متواجد يوم {date}.',
    availability_no: '❌ {doctor} غير متواجد يوم {date}.',
    availability_note: 'ملاحظة: {note}',
    schedule: 'ما عندي تحديث عن تواجد {doctor} يوم {date}.\nالدوام المعتاد: {days} من {from} إلى {to} في {branch}.',
    price: '💰 سعر {service}: {price} ريال.',
    price_range: '💰 سعر {service}: {range} ريال حسب الحالة.',
    price_on_consultation: '💰 سعر {service} يتحدد بعد الكشف.',
    price_not_at_branch: '⚠️ الخدمة غير متوفرة في {branch}.',
    doctor_info: '👨‍⚕️ {doctor}\nالتخصص: {specialty}\nالفرع: {branch}\nالدوام: {days} من {from} إلى {to}',
    doctor_experience: 'الخبرة: {years} سنة',
    branch_info: '📍 {branch}\nالعنوان: {address}، {city}\nالهاتف: {phone}\nأيام الأسبوع: {weekdays}\nنهاية الأسبوع: {weekend}',
    branch_maps: 'الموقع: {url}',
    service_info: '🦷 {service}\n{description}',
    service_duration: 'المدة: {minutes} دقيقة',
    service_preparation: 'التحضير: {preparation}',
    list_doctors: '👨‍⚕️ دكاترتنا:',
    list_branches: '📍 فروعنا:',
    list_services: '🦷 خدماتنا:',
    list_hours: '🕒 أوقات الدوام:',
    list_contact: '📞 للتواصل:',
    clarify_doctor: 'أي دكتور تقصد؟',
    clarify_service: 'أي خدمة تقصد؟',
    clarify_branch: 'أي فرع تقصد؟',
    clarify_ambiguous: 'لقيت أكثر من خيار لـ "{raw}"، أيهم تقصد؟',
    clarify_not_found: 'ما لقيت "{raw}" عندنا.',
    clarify_pick: 'اكتب الرقم أو الاسم.',
    escalate_fallback:
      'عذراً، ما قدرت أفهم طلبك. تقدر تسأل عن الأسعار أو الدكاترة أو الفروع، أو تكتب "حجز" لحجز موعد.',
    throttled: '⚠️ كثرة الرسائل. انتظر شوي.',
    persistence_error: 'عذراً، صار خلل مؤقت وما انحفظ ردك. جرب مرة ثانية بعد شوي.',
    ask_name: 'ما اسمك؟',
    ask_phone: 'مرحباً {name}! ما رقم جوالك؟',
    ask_service: 'أي خدمة تبي تحجز؟',
    ask_branch: "أي فرع تفضل؟ (أو اكتب 'تخطى' للتخطي)",
    ask_date_time: "متى تبي الموعد؟ (أو اكتب 'تخطى' للتخطي)",
    invalid_name: '⚠️ الاسم مو واضح. اكتب اسمك بالحروف.',
    invalid_phone: '⚠️ الرقم مو صحيح. جرب مرة ثانية (مثال: 0501234567)',
    invalid_service: '⚠️ ما لقيت هالخدمة. اكتب اسم الخدمة مثل: تنظيف، تبييض.',
    invalid_branch: "⚠️ ما لقيت هالفرع. اختر من القائمة أو اكتب 'تخطى'.",
    invalid_date_time: "⚠️ ما فهمت الموعد. اكتب مثلاً: بكرة 5 م، أو 2026-11-02 (أو 'تخطى').",
    ambiguous_choice: 'أيهم تقصد؟',
    booking_confirmed: '✅ تم استلام طلبك وبنرجع لك نأكد الموعد\nرقم الطلب: {id}',
    summary_name: 'الاسم: {value}',
    summary_phone: 'الجوال: {value}',
    summary_service: 'الخدمة: {value}',
    summary_doctor: 'الطبيب: {value}',
    booking_with_doctor: '✅ حجز عند {doctor}',
    summary_branch: 'الفرع: {value}',
    summary_when: 'الموعد: {value}',
    not_specified: 'غير محدد',
    booking_cancelled: 'تم إلغاء طلب الحجز. إذا احتجت شي ثاني أنا موجود.',
    booking_timeout: 'انتهت مهلة طلب الحجز السابق. تقدر تبدأ من جديد بكتابة "حجز".',
    booking_too_many_attempts: 'ما قدرت أكمل الحجز. تواصل مع العيادة مباشرة أو اكتب "حجز" لتبدأ من جديد.',
  },
  en: {
    greeting: 'Hello and welcome! 👋 How can I help? Ask about prices, doctors or branches, or book an appointment.',
    availability_yes: '✅ {doctor} is available on {date}.',
    availability_no: '❌ {doctor} is not available on {date}.',
    availability_note: 'Note: {note}',
    schedule: "I don't have an update on {doctor} for {date}.\nUsual schedule: {days}, {from}-{to} at {branch}.",
    price: '💰 {service}: {price} SAR.',
    price_range: '💰 {service}: {range} SAR depending on the case.',
    price_on_consultation: '💰 The price of {service} is set after a consultation.',
    price_not_at_branch: '⚠️ This service is not offered at {branch}.',
    doctor_info: '👨‍⚕️ {doctor}\nSpecialty: {specialty}\nBranch: {branch}\nHours: {days}, {from}-{to}',
    doctor_experience: 'Experience: {years} years',
    branch_info: '📍 {branch}\nAddress: {address}, {city}\nPhone: {phone}\nWeekdays: {weekdays}\nWeekend: {weekend}',
    branch_maps: 'Map: {url}',
    service_info: '🦷 {service}\n{description}',
    service_duration: 'Duration: {minutes} minutes',
    service_preparation: 'Preparation: {preparation}',
    list_doctors: '👨‍⚕️ Our doctors:',
    list_branches: '📍 Our branches:',
    list_services: '🦷 Our services:',
    list_hours: '🕒 Opening hours:',
    list_contact: '📞 Contact us:',
    clarify_doctor: 'Which doctor do you mean?',
    clarify_service: 'Which service do you mean?',
    clarify_branch: 'Which branch do you mean?',
    clarify_ambiguous: 'I found more than one match for "{raw}". Which one do you mean?',
    clarify_not_found: 'I couldn\'t find "{raw}".',
    clarify_pick: 'Reply with the number or the name.',
    escalate_fallback:
      'Sorry, I couldn\'t understand your request. You can ask about prices, doctors or branches, or type "book" to book an appointment.',
    throttled: '⚠️ Too many messages. Please wait a moment.',
    persistence_error: 'Sorry, something went wrong and your reply was not saved. Please try again shortly.',
    ask_name: "What's your name?",
    ask_phone: "Hi {name}! What's your mobile number?",
    ask_service: 'Which service would you like to book?',
    ask_branch: "Which branch do you prefer? (or type 'skip')",
    ask_date_time: "When would you like the appointment? (or type 'skip')",
    invalid_name: '⚠️ That name is not clear. Please type your name in letters.',
    invalid_phone: '⚠️ That number is not valid. Please try again (e.g. 0501234567)',
    invalid_service: "⚠️ I couldn't find that service. Type a service name such as cleaning or whitening.",
    invalid_branch: "⚠️ I couldn't find that branch. Pick one from the list or type 'skip'.",
    invalid_date_time: "⚠️ I didn't understand the time. Try: tomorrow 5 pm, or 2026-11-02 (or 'skip').",
    ambiguous_choice: 'Which one do you mean?',
    booking_confirmed: "✅ We received your request and will get back to you to confirm the appointment\nRequest ID: {id}",
    summary_name: 'Name: {value}',
    summary_phone: 'Mobile: {value}',
    summary_service: 'Service: {value}',
    summary_doctor: 'Doctor: {value}',
    booking_with_doctor: '✅ Booking with {doctor}',
    summary_branch: 'Branch: {value}',
    summary_when: 'When: {value}',
    not_specified: 'not specified',
    booking_cancelled: 'Your booking request was cancelled. Let me know if you need anything else.',
    booking_timeout: 'Your previous booking request expired. Type "book" to start again.',
    booking_too_many_attempts: 'I could not complete the booking. Please contact the clinic directly or type "book" to start again.',
  },
};

export function message(key: MessageKey, locale: Locale, vars: Record<string, string | number> = {}): string {
  return MESSAGES[locale][key].replace(/\{(\w+)\}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match,
  );
}

const WEEKDAY_NAMES: Record<Locale, readonly string[]> = {
  ar: ['الاثنين', 'الثلاثاء', 'الأربعاء', 'الخميس', 'الجمعة', 'السبت', 'الأحد'],
  en: ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'],
};

export function weekdayName(weekday: number, locale: Locale): string {
  return WEEKDAY_NAMES[locale][weekday - 1] ?? '';
}

const ARABIC_LETTER = /[ء-ي]/;
const LATIN_LETTER = /[A-Za-z]/;

/** Replies follow the script the user wrote in; digits and emoji alone keep the default. */
export function detectLocale(text: string, fallback: Locale): Locale {
  if (ARABIC_LETTER.test(text)) return 'ar';
  if (LATIN_LETTER.test(text)) return 'en';
  return fallback;
}
