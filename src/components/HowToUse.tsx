import React from 'react';
import { Accordion, AccordionDetails, AccordionSummary, List, ListItem, ListItemText, Typography } from '@mui/material';
import { ExpandMore as ExpandMoreIcon } from '@mui/icons-material';
import { emailFieldDescriptions } from '../types/email';

const HowToUse: React.FC = () => (
  <Accordion disableGutters sx={{ mb: 2 }}>
    <AccordionSummary expandIcon={<ExpandMoreIcon />}>
      <Typography>How to use</Typography>
    </AccordionSummary>
    <AccordionDetails>
      <Typography variant="body2" sx={{ mb: 1 }}>
        Parses raw unstructured text, such as emails copied out of a document, into structured email objects. Each
        returned email object includes:
      </Typography>
      <List dense>
        {emailFieldDescriptions().map(({ name, description }) => (
          <ListItem key={name} disableGutters>
            <ListItemText primary={name} secondary={description} />
          </ListItem>
        ))}
      </List>
    </AccordionDetails>
  </Accordion>
);

export default HowToUse;
