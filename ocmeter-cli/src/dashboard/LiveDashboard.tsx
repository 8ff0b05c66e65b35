/**
 * Live view of the most recent session: totals, cost against quota,
 * output rate, context fill and last activity.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { LiveSnapshot } from 'ocmeter-shared';
import { recordFileName, totalTokens } from 'ocmeter-shared';
import {
  activityColor,
  fmtInt,
  fmtNum,
  formatAgo,
  formatCost,
  formatDuration,
  makeBar,
  truncate,
  usageColor,
} from '../formatters';

const LABEL_WIDTH = 14;
const BAR_WIDTH = 24;

export interface LiveDashboardProps {
  snapshot: LiveSnapshot | null;
  intervalSeconds: number;
  messagesDir: string;
  progressBars: boolean;
}

/** Cost as a percentage of the model's session quota, if it has one. */
export function quotaPercentage(snapshot: LiveSnapshot): number | undefined {
  const quota = snapshot.sessionQuota;
  if (!quota || quota.isZero()) return undefined;
  return Math.min(100, snapshot.totalCost.dividedBy(quota).times(100).toNumber());
}

function Field({ label, children }: { label: string; children: React.ReactNode }): React.ReactElement {
  return (
    <Box>
      <Box width={LABEL_WIDTH}><Text dimColor>{label}</Text></Box>
      <Box>{children}</Box>
    </Box>
  );
}

function Meter({ percent, show }: { percent: number; show: boolean }): React.ReactElement | null {
  if (!show) return null;
  return (
    <Text color={usageColor(percent)}>  {makeBar(percent, BAR_WIDTH)} {percent.toFixed(0)}%</Text>
  );
}

export function LiveDashboard({
  snapshot,
  intervalSeconds,
  messagesDir,
  progressBars,
}: LiveDashboardProps): React.ReactElement {
  const footer = (
    <Box marginTop={1}>
      <Text dimColor>Refreshing every {intervalSeconds}s {'│'} Ctrl+C to exit</Text>
    </Box>
  );

  if (!snapshot) {
    return (
      <Box flexDirection="column" paddingX={1}>
        <Text bold color="cyan">ocmeter live</Text>
        <Text dimColor>Waiting for an OpenCode session in {messagesDir}</Text>
        {footer}
      </Box>
    );
  }

  const { session, recentRecord, contextUsage } = snapshot;
  const tokens = session.totalTokens;
  const quotaPct = quotaPercentage(snapshot);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box>
        <Text bold color="cyan">ocmeter live</Text>
        <Text dimColor> {'│'} </Text>
        <Text bold>{truncate(session.displayTitle, 60)}</Text>
        {snapshot.switched && <Text color="magenta">  new session</Text>}
        {snapshot.stale && <Text color="yellow">  stale: last refresh failed</Text>}
      </Box>
      <Box marginBottom={1}>
        <Text dimColor>{session.sessionId} {'│'} {session.projectName}</Text>
      </Box>

      <Field label="Interactions"><Text>{fmtInt(session.interactionCount)}</Text></Field>
      <Field label="Tokens">
        <Text bold>{fmtInt(totalTokens(tokens))}</Text>
        <Text dimColor>
          {'  '}in {fmtNum(tokens.input)} {'·'} out {fmtNum(tokens.output)} {'·'} cache w {fmtNum(tokens.cacheWrite)} {'·'} cache r {fmtNum(tokens.cacheRead)}
        </Text>
      </Field>
      <Field label="Cost">
        <Text color="green">{formatCost(snapshot.totalCost)}</Text>
        {snapshot.sessionQuota && <Text dimColor> of {formatCost(snapshot.sessionQuota)}</Text>}
        {quotaPct !== undefined && <Meter percent={quotaPct} show={progressBars} />}
      </Field>
      <Field label="Duration">
        <Text>{formatDuration(session.durationMs)}</Text>
        <Meter percent={session.durationPercentage} show={progressBars && session.durationMs !== undefined} />
      </Field>
      <Field label="Output rate"><Text>{snapshot.outputRate.toFixed(1)} tok/s</Text></Field>
      {contextUsage && (
        <Field label="Context">
          <Text>{fmtNum(contextUsage.contextSize)} / {fmtNum(contextUsage.contextWindow)}</Text>
          <Meter percent={contextUsage.usagePercentage} show={progressBars} />
        </Field>
      )}
      <Field label="Activity">
        <Text color={activityColor(snapshot.activity)}>{snapshot.activity}</Text>
        <Text dimColor>  {formatAgo(snapshot.secondsSinceActivity)}</Text>
      </Field>
      {recentRecord && (
        <Field label="Latest">
          <Text>{recordFileName(recentRecord)}</Text>
          <Text dimColor>  {recentRecord.modelId} {'·'} {fmtInt(totalTokens(recentRecord.tokens))} tokens</Text>
        </Field>
      )}
      <Field label="Models"><Text>{session.modelsUsed.join(', ')}</Text></Field>
      {footer}
    </Box>
  );
}
