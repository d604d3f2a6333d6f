/**
 * DistanceCalculator
 * Great-circle distances between geographic points (Haversine)
 */

export interface GeoPoint {
  lat: number;
  lon: number;
}

export class DistanceCalculator {
  /**
   * Earth's radius in kilometers
   */
  private readonly EARTH_RADIUS_KM = 6371;

  /**
   * Haversine distance between two coordinates, in kilometers
   *
   * Examples:
   * - Same point: 0
   * - Moscow Kremlin (55.7520, 37.6175) to Red Square (55.7539, 37.6208): ~0.29 km
   */
  haversine(lat1: number, lon1: number, lat2: number, lon2: number): number {
    const dLat = this.toRadians(lat2 - lat1);
    const dLon = this.toRadians(lon2 - lon1);

    const a =
      Math.sin(dLat / 2) * Math.sin(dLat / 2) +
      Math.cos(this.toRadians(lat1)) *
      Math.cos(this.toRadians(lat2)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
    return this.EARTH_RADIUS_KM * c;
  }

  /**
   * Distance between two points in meters
   */
  distanceMeters(from: GeoPoint, to: GeoPoint): number {
    return this.haversine(from.lat, from.lon, to.lat, to.lon) * 1000;
  }

  toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
  }
}

export const distanceCalculator = new DistanceCalculator();
