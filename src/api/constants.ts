export const PELOTON_API_DEFAULT = "https://api.onepeloton.com/";

// The workouts endpoint serves at most this many records per page.
export const WORKOUTS_PAGE_SIZE = 100;

export const DEFAULT_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
  "User-Agent": "peloton-export",
};

// Required by the overview endpoint.
export const PLATFORM_HEADERS: Record<string, string> = {
  "Peloton-Platform": "web",
};
