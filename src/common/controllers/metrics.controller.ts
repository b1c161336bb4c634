import { Controller, Get, Res, UseGuards } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { PrometheusController } from '@willsoto/nestjs-prometheus';
import type { Response } from 'express';
import { MetricsGuard } from '../guards/metrics.guard';

/** `/metrics`, limited to the allowed monitoring addresses. */
@Controller()
@ApiExcludeController()
@UseGuards(MetricsGuard)
export class MetricsController extends PrometheusController {
  @Get()
  async index(@Res({ passthrough: true }) response: Response): Promise<string> {
    return await super.index(response);
  }
}
