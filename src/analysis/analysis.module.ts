import { Module } from '@nestjs/common';
import { InferenceModule } from '../inference/inference.module';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { ImageAnnotationService } from './services/image-annotation.service';

@Module({
  imports: [InferenceModule],
  controllers: [AnalysisController],
  providers: [AnalysisService, ImageAnnotationService],
})
export class AnalysisModule {}
