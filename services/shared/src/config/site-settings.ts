export interface SiteSettings {
     /** Minutes a reservation is held for checkouts without a user; null disables reservations */
     reserveStockDurationAnonymousUser: number | null;
     /** Minutes a reservation is held for checkouts owned by a user; null disables reservations */
     reserveStockDurationAuthenticatedUser: number | null;
     defaultCountry: string;
}

function parseDuration(value: string | undefined): number | null {
     if (!value) return null;
     const minutes = parseInt(value, 10);
     return Number.isFinite(minutes) && minutes > 0 ? minutes : null;
}

export function loadSiteSettings(env: NodeJS.ProcessEnv = process.env): SiteSettings {
     return {
          reserveStockDurationAnonymousUser: parseDuration(env.RESERVE_STOCK_DURATION_ANONYMOUS_USER),
          reserveStockDurationAuthenticatedUser: parseDuration(
               env.RESERVE_STOCK_DURATION_AUTHENTICATED_USER
          ),
          defaultCountry: (env.DEFAULT_COUNTRY || 'US').toUpperCase(),
     };
}

/**
 * Reservation duration in minutes for a checkout, or null when the site does
 * not reserve stock for that kind of customer.
 */
export function getReservationLength(
     settings: SiteSettings,
     userId: string | null
): number | null {
     return userId
          ? settings.reserveStockDurationAuthenticatedUser
          : settings.reserveStockDurationAnonymousUser;
}

export function isReservationEnabled(settings: SiteSettings): boolean {
     return (
          settings.reserveStockDurationAnonymousUser !== null ||
          settings.reserveStockDurationAuthenticatedUser !== null
     );
}
