import { Router } from 'express';
import { param } from 'express-validator';
import { ValidationError, asyncHandler } from '@/middleware/errorHandler';
import { validateRequest } from '@/middleware/validateRequest';
import { FleetReportService, REPORT_TYPES, isReportType } from '@/services/FleetReportService';

export const createReportRouter = (reports: FleetReportService): Router => {
  const router = Router();

  router.get('/:reportType', [
    param('reportType').isIn(REPORT_TYPES).withMessage(`Report type must be one of: ${REPORT_TYPES.join(', ')}`),
  ], validateRequest, asyncHandler(async (req, res) => {
    const { reportType } = req.params;
    if (!isReportType(reportType)) {
      throw new ValidationError(`Unknown report type "${reportType}"`);
    }

    res.json(await reports.generate(reportType));
  }));

  return router;
};
