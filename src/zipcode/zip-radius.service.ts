import { Injectable, Logger } from '@nestjs/common';
import { ZipDatasetService } from './zip-dataset.service';
import { validateRadius, validateZip } from './zip-validation';
import { LocationCandidate } from './interfaces/zipcode.interface';

@Injectable()
export class ZipRadiusService {
  private readonly logger = new Logger(ZipRadiusService.name);

  constructor(private readonly dataset: ZipDatasetService) {}

  /**
   * Zip codes within `radiusMiles` of `originZip`, origin included.
   * Distance is great-circle and the boundary is inclusive.
   *
   * @throws {InvalidInputError} If the zip or radius is malformed
   * @throws {UnknownZipError} If the origin is not in the dataset
   */
  resolve(originZip: string, radiusMiles: number): LocationCandidate[] {
    const zip = validateZip(originZip);
    const radius = validateRadius(radiusMiles);

    const candidates = this.dataset.zipsWithinRadius(zip, radius);
    this.logger.log(
      `There are ${candidates.length} zip codes within a ${radius} mile radius of ${zip}`,
    );
    return candidates;
  }
}
