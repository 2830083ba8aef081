export function encodeMake(make: string): string {
  return encodeURIComponent(make);
}

/** `/Land%20Rover/1998/` for ("Land%20Rover", 1998). Make must already be encoded. */
export function listingPath(encodedMake: string, year: number): string {
  return `/${encodedMake}/${year}/`;
}

export function listingUrl(baseUrl: string, encodedMake: string, year: number): string {
  return `${baseUrl}${listingPath(encodedMake, year)}`;
}

export function bundleUrl(baseUrl: string, detailHref: string): string {
  return `${baseUrl}/bundle${detailHref}`;
}
