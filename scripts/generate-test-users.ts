#!/usr/bin/env tsx
/**
 * Gera cadastros sintéticos para POST /users/register
 *
 * Uso:
 *   npm run generate:test-users -- --count 5 --with-documents --out test-users.json
 *   npm run generate:test-users -- --count 2 --endpoint http://localhost:3000/users/register
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";
import { z } from "zod";
import { DOCUMENT_FIELDS } from "../src/domain/entities/Registration";

const seedsSchema = z.object({
  firstNames: z.array(z.string()).nonempty(),
  lastNames: z.array(z.string()).nonempty(),
  cities: z.array(z.string()).nonempty(),
  neighborhoods: z.array(z.string()).nonempty(),
  activities: z.object({
    employed: z.array(z.string()).nonempty(),
    business: z.array(z.string()).nonempty(),
  }),
  relations: z.array(z.string()).nonempty(),
  phonePrefixes: z.array(z.string()).nonempty(),
});

type Seeds = z.infer<typeof seedsSchema>;

// PDF mínimo válido, suficiente para exercitar o upload
const TINY_PDF_BASE64 = Buffer.from(
  "%PDF-1.4\n1 0 obj<</Type/Catalog/Pages 2 0 R>>endobj\n2 0 obj<</Type/Pages/Kids[]/Count 0>>endobj\ntrailer<</Root 1 0 R>>\n%%EOF\n"
).toString("base64");

const pick = <T>(items: readonly T[]): T => items[Math.floor(Math.random() * items.length)];
const randomInt = (min: number, max: number) => min + Math.floor(Math.random() * (max - min + 1));

const asciiSlug = (value: string) =>
  value
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^A-Za-z]/g, "")
    .toLowerCase();

const birthDate = (): string => {
  const now = new Date();
  const ageInDays = randomInt(18 * 365, 65 * 365);
  return new Date(now.getTime() - ageInDays * 86_400_000).toISOString().slice(0, 10);
};

const buildUser = (seeds: Seeds, index: number, withDocuments: boolean) => {
  const firstName = pick(seeds.firstNames);
  const lastName = pick(seeds.lastNames);
  const activity = pick(["employed", "business"] as const);
  const handle = `${asciiSlug(firstName)}${asciiSlug(lastName)}${randomInt(10, 999)}`;
  const phone = () => `${pick(seeds.phonePrefixes)}${randomInt(1_000_000, 9_999_999)}`;
  const referenceName = () => `${pick(seeds.firstNames)} ${pick(seeds.lastNames)}`;

  const user: Record<string, unknown> = {
    email: `${handle}.${Date.now()}${index}@example.com`,
    full_name: `${firstName} ${lastName}`,
    national_id: `${pick(["V", "E"])}-${randomInt(5_000_000, 35_000_000)}`,
    phone1: phone(),
    phone2: Math.random() < 0.5 ? phone() : null,
    address: `${pick(seeds.neighborhoods)}, Casa #${randomInt(1, 999)}, ${pick(seeds.cities)}`,
    instagram: `@${handle}`,
    facebook: handle,
    tiktok: Math.random() < 0.5 ? `@${handle}_oficial` : null,
    ref1_name: referenceName(),
    ref1_relation: pick(seeds.relations),
    ref2_name: referenceName(),
    ref2_relation: pick(seeds.relations),
    monthly_income: (randomInt(20_000, 350_000) / 100).toFixed(2),
    activity_type: activity,
    position: pick(seeds.activities[activity]),
    birth_date: birthDate(),
  };

  if (withDocuments) {
    for (const field of DOCUMENT_FIELDS) {
      user[field] = { data: TINY_PDF_BASE64, content_type: "application/pdf" };
    }
  }

  return user;
};

const curlCommand = (user: Record<string, unknown>, endpoint: string): string => {
  const body = JSON.stringify(user).replace(/'/g, "'\\''");
  return `curl -X POST '${endpoint}' -H 'Content-Type: application/json' -d '${body}'`;
};

const main = () => {
  const { values } = parseArgs({
    options: {
      count: { type: "string", short: "n", default: "3" },
      "with-documents": { type: "boolean", default: false },
      endpoint: { type: "string" },
      out: { type: "string" },
    },
  });

  const count = Number(values.count);
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`--count precisa ser um inteiro positivo (recebido: ${values.count})`);
  }

  const seedsPath = path.join(__dirname, "data/test-user-seeds.json");
  const seeds = seedsSchema.parse(JSON.parse(fs.readFileSync(seedsPath, "utf8")));
  const users = Array.from({ length: count }, (_, index) => buildUser(seeds, index, values["with-documents"] ?? false));

  const json = JSON.stringify(users, null, 2);
  if (values.out) {
    fs.writeFileSync(values.out, `${json}\n`);
    console.log(`✅ ${count} usuários gravados em ${values.out}`);
  } else {
    console.log(json);
  }

  if (values.endpoint) {
    const endpoint = values.endpoint;
    console.log("\n# Comandos curl");
    users.forEach((user) => console.log(curlCommand(user, endpoint)));
  }
};

try {
  main();
} catch (error) {
  console.error("❌ Erro ao gerar usuários:", error instanceof Error ? error.message : error);
  process.exit(1);
}
