import React from 'react';
import { Accordion, AccordionDetails, AccordionSummary, Box, Typography } from '@mui/material';
import { ExpandMore as ExpandMoreIcon } from '@mui/icons-material';

interface RawOutputViewerProps {
  rawText: string;
}

const RawOutputViewer: React.FC<RawOutputViewerProps> = ({ rawText }) => (
  <Accordion disableGutters sx={{ mb: 2 }}>
    <AccordionSummary expandIcon={<ExpandMoreIcon />}>
      <Typography>Raw model output</Typography>
    </AccordionSummary>
    <AccordionDetails>
      {rawText ? (
        <Box
          component="pre"
          sx={{ m: 0, whiteSpace: 'pre-wrap', wordBreak: 'break-word', fontFamily: 'monospace', fontSize: '0.8rem' }}
        >
          {rawText}
        </Box>
      ) : (
        <Typography variant="body2" color="text.secondary">
          Nothing received yet.
        </Typography>
      )}
    </AccordionDetails>
  </Accordion>
);

export default RawOutputViewer;
