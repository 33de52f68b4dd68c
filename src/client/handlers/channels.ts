/*
 * Chat channels.  We keep each channel's member list; everything else goes
 * straight to the display.
 */

import * as M from '../../protocol/message'

import { ClientSession } from '../session'
import { Context, HandlerTable } from './common'

function members(session: ClientSession, channel: string): Set<string> {
  let s = session.channels.get(channel);
  if (s === undefined) {
    s = new Set();
    session.channels.set(channel, s);
  }
  return s;
}

export const handlers = {
  channels: ({session}: Context, m: M.Channels) => {
    for (const ch of m.channels) members(session, ch);
    session.post(d => d.channelList(m.channels));
  },

  new_channel: ({session}: Context, m: M.NewChannel) => {
    members(session, m.channel);
    session.post(d => d.channelCreated(m.channel));
  },

  delete_channel: ({session}: Context, m: M.DeleteChannel) => {
    session.channels.delete(m.channel);
    session.post(d => d.channelDeleted(m.channel));
  },

  channel_members: ({session}: Context, m: M.ChannelMembers) => {
    session.channels.set(m.channel, new Set(m.members));
    session.post(d => d.channelMembers(m.channel, m.members));
  },

  // we're in
  join_channel_auth: ({session}: Context, m: M.JoinChannelAuth) => {
    members(session, m.channel).add(m.nick);
    session.post(d => d.channelJoined(m.channel));
  },

  // someone else is
  join_channel: ({session}: Context, m: M.JoinChannel) => {
    members(session, m.channel).add(m.nick);
    session.post(d => d.channelMemberJoined(m.channel, m.nick));
  },

  leave_channel: ({session}: Context, m: M.LeaveChannel) => {
    session.channels.get(m.channel)?.delete(m.nick);
    session.post(d => d.channelMemberLeft(m.channel, m.nick));
  },

  channel_text_msg: ({session}: Context, m: M.ChannelTextMsg) => {
    session.post(d => d.chatMessageReceived(m.channel, m.nick, m.text));
  },
} satisfies Partial<HandlerTable>;
