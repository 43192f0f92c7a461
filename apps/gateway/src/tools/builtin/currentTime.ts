import { z } from "zod";
import { BaseTool } from "../BaseTool.js";

const CurrentTimeSchema = z.object({
  timezone: z.string().default("UTC").describe("IANA time zone, e.g. Europe/Paris"),
});

export interface CurrentTimeOutput {
  timezone: string;
  iso: string;
  /** Wall-clock time in the zone, `YYYY-MM-DD HH:mm:ss` */
  local: string;
}

export class CurrentTimeTool extends BaseTool<typeof CurrentTimeSchema> {
  constructor(private readonly now: () => Date = () => new Date()) {
    super(
      {
        name: "current_time",
        description: "Get the current date and time",
        category: "utility",
        dangerLevel: "safe",
        requiresConfirmation: false,
        examples: ['[TOOL: current_time("Europe/London")]'],
      },
      CurrentTimeSchema,
    );
  }

  protected async run(params: z.infer<typeof CurrentTimeSchema>): Promise<CurrentTimeOutput> {
    const date = this.now();
    const parts = new Intl.DateTimeFormat("en-US", {
      timeZone: params.timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    }).formatToParts(date);

    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "00";

    return {
      timezone: params.timezone,
      iso: date.toISOString(),
      local: `${part("year")}-${part("month")}-${part("day")} ${part("hour")}:${part("minute")}:${part("second")}`,
    };
  }
}
