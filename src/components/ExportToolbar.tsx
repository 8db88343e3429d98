import React from 'react';
import { Box, Button, Tooltip } from '@mui/material';
import { Download as DownloadIcon } from '@mui/icons-material';
import type { EmailCollection } from '../types/email';
import { CSV_MIME_TYPE, JSON_MIME_TYPE, downloadText, emailsToCsv, emailsToJson } from '../utils/exporters';
import { logger } from '../utils/logger';

interface ExportToolbarProps {
  emails: EmailCollection;
  /** Export only makes sense for a finished, successful parse. */
  enabled: boolean;
}

const ExportToolbar: React.FC<ExportToolbarProps> = ({ emails, enabled }) => {
  const handleDownloadJson = () => {
    logger.info(`Exporting ${emails.length} email(s) as JSON`);
    downloadText(emailsToJson(emails), 'emails.json', JSON_MIME_TYPE);
  };

  const handleDownloadCsv = () => {
    logger.info(`Exporting ${emails.length} email(s) as CSV`);
    downloadText(emailsToCsv(emails), 'emails.csv', CSV_MIME_TYPE);
  };

  return (
    <Tooltip title={enabled ? '' : 'Available once parsing has finished'}>
      <Box sx={{ display: 'flex', gap: 1, mb: 2 }}>
        <Button variant="outlined" startIcon={<DownloadIcon />} onClick={handleDownloadJson} disabled={!enabled}>
          Download JSON
        </Button>
        <Button variant="outlined" startIcon={<DownloadIcon />} onClick={handleDownloadCsv} disabled={!enabled}>
          Download CSV
        </Button>
      </Box>
    </Tooltip>
  );
};

export default ExportToolbar;
