import { Logger } from "../../config/logger";
import { EligibilityTarget, SeniorityLevel, TargetStatus } from "../../shared/types/matching.types";
import { SupabaseRestClient } from "../supabase.client";

const JOB_POSTINGS_TABLE = "job_postings";
const JOB_POSTING_COLUMNS =
  "job_id,position,company,department,location_city,location_country,location_type,about_role,responsibilities,requirements,status";

export interface JobPostingRow {
  job_id: string;
  position: string;
  company?: string | null;
  department?: string | null;
  location_city?: string | null;
  location_country?: string | null;
  location_type?: string | null;
  about_role?: string | null;
  responsibilities?: unknown;
  requirements?: unknown;
  status?: string | null;
}

export class JobPostingsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient?: SupabaseRestClient,
  ) {}

  isEnabled(): boolean {
    return Boolean(this.supabaseClient);
  }

  async listActiveTargets(limit = 100): Promise<EligibilityTarget[]> {
    if (!this.supabaseClient) {
      return [];
    }

    const rows = await this.supabaseClient.selectMany<JobPostingRow>(
      JOB_POSTINGS_TABLE,
      { status: "active" },
      JOB_POSTING_COLUMNS,
      { limit, order: "created_at.desc" },
    );

    this.logger.info("Active job postings loaded", { count: rows.length });
    return rows.map((row) => mapJobPostingRow(row));
  }
}

export function mapJobPostingRow(row: JobPostingRow): EligibilityTarget {
  const requirements = parseRequirements(row.requirements);
  const location = [row.location_city, row.location_country, row.location_type]
    .map((item) => item?.trim() ?? "")
    .filter((item) => item.length > 0)
    .join(", ");

  return {
    id: row.job_id,
    title: row.position.trim(),
    company: row.company?.trim() || undefined,
    status: parseStatus(row.status),
    seniority: inferSeniority(row.position),
    requiredCompetencies: requirements.mustHave,
    optionalCompetencies: requirements.niceToHave,
    description: buildDescription(row.about_role, row.responsibilities),
    location: location || undefined,
  };
}

export function parseStatus(value: string | null | undefined): TargetStatus {
  const normalized = (value ?? "active").trim().toLowerCase();
  if (normalized === "active" || normalized === "inactive" || normalized === "filled" || normalized === "closed") {
    return normalized;
  }
  return "inactive";
}

export function inferSeniority(title: string): SeniorityLevel {
  const normalized = title.toLowerCase();
  if (/\bprincipal\b/.test(normalized)) {
    return "principal";
  }
  if (/\bstaff\b/.test(normalized)) {
    return "staff";
  }
  if (/\b(lead|head of)\b/.test(normalized)) {
    return "lead";
  }
  if (/\b(senior|sr\.?)\s/.test(`${normalized} `)) {
    return "senior";
  }
  if (/\b(junior|jr\.?|intern|graduate)\s/.test(`${normalized} `)) {
    return "junior";
  }
  if (/\b(mid|intermediate)\b/.test(normalized)) {
    return "mid";
  }
  return "unknown";
}

function parseRequirements(value: unknown): { mustHave: string[]; niceToHave: string[] } {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { mustHave: [], niceToHave: [] };
  }
  return {
    mustHave: "must_have" in value ? toStringList(value.must_have) : [],
    niceToHave: "nice_to_have" in value ? toStringList(value.nice_to_have) : [],
  };
}

function buildDescription(aboutRole: string | null | undefined, responsibilities: unknown): string {
  const about = aboutRole?.trim() ?? "";
  const duties = toStringList(responsibilities);
  const parts: string[] = [];
  if (about) {
    parts.push(about);
  }
  if (duties.length) {
    parts.push(`Responsibilities: ${duties.join("; ")}`);
  }
  return parts.join("\n");
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => (typeof item === "string" ? item.trim() : ""))
    .filter((item) => item.length > 0);
}
