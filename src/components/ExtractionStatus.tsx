import React from 'react';
import { Alert, Box, LinearProgress, Typography } from '@mui/material';
import type { ExtractionState } from '../hooks/useEmailExtraction';
import { describeExtractionError } from '../utils/errors';

interface ExtractionStatusProps {
  state: ExtractionState;
}

const ExtractionStatus: React.FC<ExtractionStatusProps> = ({ state }) => {
  const count = state.emails.length;

  switch (state.status) {
    case 'idle':
      return null;
    case 'streaming':
      return (
        <Box sx={{ mb: 2 }}>
          <LinearProgress sx={{ mb: 1 }} />
          <Typography variant="body2" color="text.secondary">
            {count === 0 ? 'Waiting for the model…' : `Partially parsed ${count} email(s) so far...`}
          </Typography>
        </Box>
      );
    case 'done':
      return (
        <Alert severity="success" sx={{ mb: 2 }}>
          {`Successfully parsed ${count} email(s)!`}
        </Alert>
      );
    case 'error':
      return (
        <Alert severity="error" sx={{ mb: 2 }}>
          {state.error ? `${describeExtractionError(state.error)}: ${state.error.message}` : 'Parsing failed'}
        </Alert>
      );
  }
};

export default ExtractionStatus;
