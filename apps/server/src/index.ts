// apps/server/src/index.ts
import http from "http";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { getCalendarAdapters } from "./services/calendar/index.js";
import { LocalEventStore } from "./services/calendar/LocalEventStore.js";
import { CredentialProvider } from "./services/credentials/CredentialProvider.js";
import { CredentialStore } from "./services/credentials/CredentialStore.js";
import { GoogleTokenRefresher, MicrosoftTokenRefresher } from "./services/credentials/tokenRefreshers.js";
import { getDb } from "./services/roomDb.js";
import { RoomStore } from "./services/rooms/RoomStore.js";
import { SchedulingEngine } from "./services/scheduling/SchedulingEngine.js";

const db = getDb();
const rooms = new RoomStore(db);

const credentials = new CredentialProvider({
  store: new CredentialStore(db),
  refreshers: {
    google: new GoogleTokenRefresher({
      clientId: env.GOOGLE_CLIENT_ID,
      clientSecret: env.GOOGLE_CLIENT_SECRET,
      redirectUri: env.GOOGLE_REDIRECT_URI,
    }),
    microsoft: new MicrosoftTokenRefresher({
      clientId: env.MICROSOFT_CLIENT_ID,
      clientSecret: env.MICROSOFT_CLIENT_SECRET,
      tenantId: env.MICROSOFT_TENANT_ID,
    }),
  },
});

const engine = new SchedulingEngine({
  rooms,
  adapters: getCalendarAdapters({
    credentials,
    localEvents: new LocalEventStore(db),
    timezone: env.DEFAULT_TIMEZONE,
  }),
  timezone: env.DEFAULT_TIMEZONE,
  serializeBookings: env.SERIALIZE_BOOKINGS,
  defaultRecurringSpanDays: env.DEFAULT_RECURRING_SPAN_DAYS,
});

const app = createApp({ engine, rooms, timezone: env.DEFAULT_TIMEZONE });
const server = http.createServer(app);

server.listen(env.PORT, () => {
  console.log(`✅ RoomSync listening on :${env.PORT} (timezone ${env.DEFAULT_TIMEZONE})`);
});
