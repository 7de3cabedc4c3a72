import { Module } from '@nestjs/common';
import { RepresentativesRepository } from './representatives.repository';

@Module({
  providers: [RepresentativesRepository],
  exports: [RepresentativesRepository],
})
export class RepresentativesModule {}
