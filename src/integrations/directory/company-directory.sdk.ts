import { CompanyDirectory } from "../../domain/repositories";
import { CallEvent } from "../../domain/types";

export interface CompanyDirectoryOptions {
  baseUrl?: string;
  userAgent?: string;
}

// Lookup service for direct-integration partners; its answer is authoritative
export class HttpCompanyDirectory implements CompanyDirectory {
  constructor(private readonly options: CompanyDirectoryOptions) {}

  async findCompanyNumber(event: CallEvent): Promise<number | null> {
    if (!this.options.baseUrl) return null;
    const params = new URLSearchParams();
    params.set("group", event.groupId);
    params.set("enterprise", event.enterpriseId);
    params.set("user", event.userId);
    params.set("extension", event.extension);
    const url = `${this.options.baseUrl.replace(/\/$/, "")}/company-number?${params.toString()}`;

    const res = await fetch(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        "User-Agent": this.options.userAgent ?? "alert911-ingest/0.1.0",
      },
    });
    if (res.status === 404) return null;
    if (!res.ok) {
      const txt = await res.text().catch(() => "<no body>");
      throw new Error(`Company directory lookup failed: ${res.status} ${res.statusText} ${txt}`);
    }
    const json: unknown = await res.json();
    if (typeof json !== "object" || json === null || !("companyNumber" in json)) return null;
    const value = json.companyNumber;
    return typeof value === "number" && Number.isInteger(value) ? value : null;
  }
}
