import { AnalysisResult } from '../../analysis/types';
import { UploadedDocument } from '../machine';

export const DEED: UploadedDocument = {
  originalName: 'sale-deed.pdf',
  size: 9,
  bytes: Buffer.from('%PDF-1.4\n'),
};

export const GAP_REPORT: AnalysisResult = {
  property_summary: 'Plot 12, Pune',
  current_owner: 'A. Rao',
  risk_score: 'High',
  analysis_summary: 'Chain has a 10-year gap.',
  missing_docs: [
    {
      year: '1995',
      doc_type: 'Sale Deed',
      doc_no: 'N/A',
      reason: 'Referenced in recitals, not attached',
      risk_explained: 'Root title unverifiable',
    },
  ],
};

export const TWO_GAP_REPORT: AnalysisResult = {
  ...GAP_REPORT,
  missing_docs: [
    ...GAP_REPORT.missing_docs,
    {
      year: '2004',
      doc_type: 'Rectification Deed',
      doc_no: '2231/2004',
      reason: 'Boundary correction cited in schedule',
      risk_explained: 'Area mismatch with 7/12 extract',
    },
  ],
};

export const CLEAN_REPORT: AnalysisResult = {
  property_summary: 'Flat 4B, Kothrud',
  current_owner: 'S. Deshpande',
  risk_score: 'Low',
  analysis_summary: 'Every link from 1991 onward is present.',
  missing_docs: [],
};
