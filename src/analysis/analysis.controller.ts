import {
  Body,
  Controller,
  ForbiddenException,
  BadRequestException,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiBody,
  ApiConsumes,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { memoryStorage } from 'multer';
import { toHttpException } from '../common/errors/http-exception.mapper';
import {
  RelaxedThrottle,
  StrictThrottle,
} from '../common/decorators/throttle.decorator';
import { AnalysisService } from './analysis.service';
import { PRIVACY_POLICY } from './constants/privacy-policy';
import { REQUEST_MESSAGES } from './constants/messages';
import { AnalyzeImageDto } from './dto/analyze-image.dto';
import {
  AnalysisResponseDto,
  PrivacyPolicyResponseDto,
} from './dto/analysis-response.dto';
import { imageFileFilter, MAX_IMAGE_SIZE } from './utils/file-validation';

@Controller('api/analysis')
@ApiTags('Analysis')
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(private readonly analysisService: AnalysisService) {}

  @Get('privacy-policy')
  @RelaxedThrottle()
  @ApiOperation({ summary: 'Privacy policy to accept before uploading' })
  @ApiResponse({ status: 200, type: PrivacyPolicyResponseDto })
  getPrivacyPolicy(): PrivacyPolicyResponseDto {
    return PRIVACY_POLICY;
  }

  @Post()
  @HttpCode(HttpStatus.OK)
  @StrictThrottle()
  @ApiOperation({
    summary: 'Analyze an ultrasound image for kidney stones',
    description:
      'Forwards the image to the hosted detection model and returns the verdict with the detections outlined on the image.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: ['image', 'privacyPolicyAccepted'],
      properties: {
        image: { type: 'string', format: 'binary' },
        privacyPolicyAccepted: { type: 'boolean' },
      },
    },
  })
  @ApiResponse({ status: 200, type: AnalysisResponseDto })
  @ApiResponse({ status: 400, description: 'Missing or unsupported image' })
  @ApiResponse({ status: 403, description: 'Privacy policy not accepted' })
  @ApiResponse({ status: 413, description: 'Image larger than 10MB' })
  @ApiResponse({ status: 422, description: 'Image could not be decoded' })
  @ApiResponse({ status: 502, description: 'Inference service failure' })
  @ApiResponse({ status: 504, description: 'Inference service timed out' })
  @UseInterceptors(
    FileInterceptor('image', {
      storage: memoryStorage(), // Keep in memory, don't save to disk
      limits: {
        fileSize: MAX_IMAGE_SIZE,
        files: 1,
      },
      fileFilter: imageFileFilter,
    }),
  )
  async analyzeImage(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: AnalyzeImageDto,
  ): Promise<AnalysisResponseDto> {
    if (!body.privacyPolicyAccepted) {
      throw new ForbiddenException(REQUEST_MESSAGES.PRIVACY_NOT_ACCEPTED);
    }

    if (!file) {
      throw new BadRequestException(REQUEST_MESSAGES.MISSING_IMAGE);
    }

    this.logger.log(
      `Analysis request: file ${file.originalname}, ${file.size} bytes, ${file.mimetype}`,
    );

    try {
      const result = await this.analysisService.analyze(
        file.buffer,
        file.mimetype,
        file.originalname,
      );

      return {
        message: result.message,
        isPositive: result.isPositive,
        detections: result.detections,
        annotatedImage: `data:image/png;base64,${result.annotatedImage.toString('base64')}`,
        rawResponse: result.rawResponse,
      };
    } catch (error) {
      const exception = toHttpException(error);
      this.logger.error(
        `Analysis failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw exception;
    }
  }
}
