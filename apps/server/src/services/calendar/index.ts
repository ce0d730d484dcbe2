import type { CredentialSource } from "../credentials/CredentialProvider.js";
import type { AdapterRegistry } from "./CalendarAdapter.js";
import { GoogleCalendarAdapter } from "./GoogleCalendarAdapter.js";
import { LocalCalendarAdapter } from "./LocalCalendarAdapter.js";
import type { LocalEventStore } from "./LocalEventStore.js";
import { MicrosoftCalendarAdapter } from "./MicrosoftCalendarAdapter.js";

export function getCalendarAdapters(options: {
  credentials: CredentialSource;
  localEvents: LocalEventStore;
  timezone: string;
}): AdapterRegistry {
  const { credentials, localEvents, timezone } = options;
  return {
    google: new GoogleCalendarAdapter({ credentials, timezone }),
    microsoft: new MicrosoftCalendarAdapter({ credentials, timezone }),
    local: new LocalCalendarAdapter(localEvents, timezone),
  };
}
