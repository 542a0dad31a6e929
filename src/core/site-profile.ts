/**
 * Booking site layout: URLs, selectors and the centres it offers.
 */

export interface SiteProfile {
  loginUrl: string;
  resultsUrl: string;
  /** A post-login URL containing any of these is treated as authenticated */
  successUrlMarkers: readonly string[];
  selectors: {
    username: string;
    password: string;
    submit: string;
    /** Shown on the login page after rejected credentials */
    loginError: string;
    /** `{center}` is replaced by the centre id */
    centerOption: string;
    dateFrom: string;
    dateTo: string;
    search: string;
    slot: string;
  };
  slotAttributes: {
    date: string;
    time: string;
    center: string;
    testType: string;
    bookingUrl: string;
  };
}

/**
 * Known test centres, id → display name
 */
export const TEST_CENTERS: Readonly<Record<string, string>> = {
  london: 'London Test Centre',
  manchester: 'Manchester Test Centre',
  birmingham: 'Birmingham Test Centre',
  leeds: 'Leeds Test Centre',
  liverpool: 'Liverpool Test Centre',
  sheffield: 'Sheffield Test Centre',
  edinburgh: 'Edinburgh Test Centre',
  glasgow: 'Glasgow Test Centre',
  cardiff: 'Cardiff Test Centre',
  bristol: 'Bristol Test Centre',
};

export function createSiteProfile(baseUrl: string): SiteProfile {
  const root = baseUrl.replace(/\/+$/, '');
  return {
    loginUrl: `${root}/sign-in`,
    resultsUrl: `${root}/appointments`,
    successUrlMarkers: ['dashboard', 'appointments'],
    selectors: {
      username: '#username',
      password: '#password',
      submit: "button[type='submit']",
      loginError: '.govuk-error-summary',
      centerOption: "input[value='{center}']",
      dateFrom: '#date-from',
      dateTo: '#date-to',
      search: '#search-appointments',
      slot: '.appointment-slot',
    },
    slotAttributes: {
      date: 'data-date',
      time: 'data-time',
      center: 'data-center',
      testType: 'data-test-type',
      bookingUrl: 'href',
    },
  };
}

export function centerOptionSelector(profile: SiteProfile, center: string): string {
  return profile.selectors.centerOption.replace('{center}', center);
}
