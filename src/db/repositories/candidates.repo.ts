import { Logger } from "../../config/logger";
import { SupabaseWriter } from "../supabase.client";

const CANDIDATES_TABLE = "candidates";
const NIL_UUID = "00000000-0000-0000-0000-000000000000";

export interface NewCandidate {
  fullName: string;
  email: string;
  phoneNumber: string | null;
}

export class CandidatesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient: SupabaseWriter,
  ) {}

  async insertCandidate(input: NewCandidate): Promise<string> {
    const rows = await this.supabaseClient.insert(CANDIDATES_TABLE, {
      full_name: input.fullName,
      email: input.email,
      phone_number: input.phoneNumber,
    });
    const first = rows[0];
    const id = typeof first === "object" && first !== null && "id" in first ? first.id : undefined;
    if (typeof id !== "string" && typeof id !== "number") {
      throw new Error(`Candidate insert returned no id for ${input.email}`);
    }
    return String(id);
  }

  async deleteAll(): Promise<void> {
    await this.supabaseClient.deleteWhere(CANDIDATES_TABLE, {
      column: "id",
      operator: "neq",
      value: NIL_UUID,
    });
    this.logger.info("All candidates deleted");
  }
}
