import React, { useState } from 'react';
import { List, Typography, Box } from '@mui/material';
import type { EmailCollection } from '../types/email';
import EmailItem from './EmailItem';

interface EmailListProps {
  emails: EmailCollection;
  emptyMessage?: string;
}

const EmailList: React.FC<EmailListProps> = ({ emails, emptyMessage = 'No emails parsed yet.' }) => {
  const [expandedIndex, setExpandedIndex] = useState<number | null>(null);

  const handleExpand = (index: number) => {
    setExpandedIndex(expandedIndex === index ? null : index);
  };

  if (emails.length === 0) {
    return (
      <Box sx={{ p: 2 }}>
        <Typography variant="body2" color="text.secondary">
          {emptyMessage}
        </Typography>
      </Box>
    );
  }

  return (
    <List sx={{ width: '100%', mx: 'auto', minWidth: '100%' }}>
      {emails.map((email, index) => (
        <EmailItem
          key={index}
          email={email}
          index={index}
          isExpanded={expandedIndex === index}
          onExpand={handleExpand}
        />
      ))}
    </List>
  );
};

export default EmailList;
