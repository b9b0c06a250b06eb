import { Language, languages } from "./domain/model";

const port = Number(process.env.PORT ?? 3000);

const parseLanguages = (value: string | undefined): Language[] => {
  if (!value) {
    return [...languages];
  }

  const requested = value.split(",").map((item) => item.trim().toLowerCase());
  const selected = languages.filter((language) => requested.includes(language));
  return selected.length > 0 ? selected : [...languages];
};

export const config = {
  port,
  serviceName: "recruitment-workflow",
  databaseUrl: process.env.DATABASE_URL ?? "",
  redisUrl: process.env.REDIS_URL ?? "",
  internalApiKey: process.env.INTERNAL_API_KEY ?? "",
  logLevel: process.env.LOG_LEVEL ?? "info",
  publicBaseUrl: (process.env.PUBLIC_BASE_URL ?? `http://localhost:${port}`).replace(/\/+$/, ""),
  documents: {
    dir: process.env.DOCUMENTS_DIR ?? "storage/documents",
    languages: parseLanguages(process.env.DOCUMENT_LANGUAGES),
    timeZone: process.env.DOCUMENT_TIME_ZONE ?? "Indian/Comoro",
    arabicFontPath: process.env.ARABIC_FONT_PATH ?? "",
    arabicBoldFontPath: process.env.ARABIC_BOLD_FONT_PATH ?? ""
  },
  organization: {
    name: process.env.ORG_NAME ?? "Service Recrutement",
    nameAr: process.env.ORG_NAME_AR ?? "مصلحة التوظيف",
    address: process.env.ORG_ADDRESS ?? "Siège social",
    addressAr: process.env.ORG_ADDRESS_AR ?? "المقر الرئيسي",
    phone: process.env.ORG_PHONE ?? "+269 000 00 00",
    email: process.env.ORG_EMAIL ?? "rh@example.com"
  },
  whatsappCountryCode: process.env.WHATSAPP_COUNTRY_CODE ?? "269"
};

export type OrganizationProfile = typeof config.organization;
