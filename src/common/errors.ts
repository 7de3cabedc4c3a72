import { NotFoundException } from '@nestjs/common';

export class RepresentativeNotFoundError extends NotFoundException {
  constructor(readonly representativeId: number | string, readonly expectedStatus: 'queued' | 'prayed') {
    super(
      expectedStatus === 'queued'
        ? 'Representative ' + representativeId + ' not found or already prayed for'
        : 'Representative ' + representativeId + ' not found or still in the queue',
    );
  }
}

export class UnknownCountryError extends NotFoundException {
  constructor(readonly countryCode: string) {
    super('Country not found');
  }
}

/** Unreadable or malformed roster, geometry, mapping or icon file. Fatal at startup. */
export class DataLoadError extends Error {
  constructor(message: string, readonly filePath: string) {
    super(message + ' (' + filePath + ')');
    this.name = 'DataLoadError';
  }
}
