export interface IHeadingProvider {
  /** Host heading in degrees from north, null when unavailable */
  currentHeadingDegrees(): number | null;
}
