import React from 'react';
import { ListItem, ListItemText, Collapse, Typography, Box, Chip } from '@mui/material';
import { ExpandMore as ExpandMoreIcon, ExpandLess as ExpandLessIcon } from '@mui/icons-material';
import type { EmailRecord } from '../types/email';

interface EmailItemProps {
  email: EmailRecord;
  index: number;
  isExpanded: boolean;
  onExpand: (index: number) => void;
}

const FieldRow: React.FC<{ label: string; value?: string }> = ({ label, value }) => {
  if (!value) return null;
  return (
    <Box sx={{ mb: 2 }}>
      <Typography variant="subtitle2" color="text.secondary" sx={{ fontWeight: 'bold' }}>
        {label}:
      </Typography>
      <Typography variant="body1" sx={{ mb: 1 }}>
        {value}
      </Typography>
    </Box>
  );
};

// Cards are keyed by position, so a record that is still streaming keeps its
// expanded state as fields fill in.
const EmailItem: React.FC<EmailItemProps> = ({ email, index, isExpanded, onExpand }) => {
  const number = index + 1;
  const title = email.subject ? `Email ${number}: ${email.subject}` : `Email ${number}`;

  return (
    <React.Fragment>
      <ListItem
        alignItems="flex-start"
        sx={{
          cursor: 'pointer',
          '&:hover': { backgroundColor: 'action.hover' },
          borderBottom: '1px solid',
          borderColor: 'divider',
          bgcolor: 'background.paper',
          mb: 2,
          borderRadius: 1,
          p: 2,
          boxShadow: 1,
        }}
        onClick={() => onExpand(index)}
        data-testid="email-item-clickable"
      >
        <Box sx={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', width: '100%' }}>
          <ListItemText
            primary={
              <Box sx={{ display: 'flex', alignItems: 'center', gap: 1, flexWrap: 'wrap' }}>
                <Typography variant="subtitle1">{title}</Typography>
                {email.sender && <Chip label={email.sender} size="small" variant="outlined" />}
              </Box>
            }
            secondary={
              email.preview ? (
                <Typography variant="body2" color="text.secondary" component="span" sx={{ mt: 1, display: 'block' }}>
                  {email.preview}
                </Typography>
              ) : undefined
            }
          />
          <Box sx={{ display: 'flex', alignItems: 'center', gap: 1 }}>
            {email.date && (
              <Typography variant="caption" color="text.secondary">
                {email.date}
              </Typography>
            )}
            {isExpanded ? <ExpandLessIcon /> : <ExpandMoreIcon />}
          </Box>
        </Box>
      </ListItem>
      <Collapse in={isExpanded} timeout="auto" unmountOnExit>
        <Box sx={{ p: 3, backgroundColor: 'action.hover', borderLeft: 3, borderColor: 'primary.main', ml: 2, mr: 2, mb: 2, borderRadius: 1 }}>
          <FieldRow label="Date" value={email.date} />
          <FieldRow label="Sender" value={email.sender} />
          <FieldRow label="Subject" value={email.subject} />
          <FieldRow label="Preview" value={email.preview} />
          {email.body && (
            <Box>
              <Typography variant="subtitle2" color="text.secondary" sx={{ fontWeight: 'bold', mb: 1 }}>
                Body:
              </Typography>
              <Box component="pre" sx={{ m: 0, whiteSpace: 'pre-wrap', fontFamily: 'inherit' }}>
                {email.body}
              </Box>
            </Box>
          )}
        </Box>
      </Collapse>
    </React.Fragment>
  );
};

export default EmailItem;
