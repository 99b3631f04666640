// GraphQL documents sent through RemoteGateway.graphql

export const DISCUSSION_SEARCH_QUERY = `
query DiscussionSearch($search: String!) {
  search(query: $search, type: DISCUSSION, first: 10) {
    edges {
      node {
        ... on Discussion {
          number
          title
          url
          bodyText
          isAnswered
          author { login }
        }
      }
    }
  }
}`;

const ACTOR = 'actor { login }';

const TIMELINE_ITEM_FRAGMENTS = `
  __typename
  ... on IssueComment { author { login } createdAt body }
  ... on ClosedEvent {
    ${ACTOR} createdAt
    closer {
      __typename
      ... on Commit { abbreviatedOid }
      ... on PullRequest { number }
    }
  }
  ... on ReopenedEvent { ${ACTOR} createdAt }
  ... on LabeledEvent { ${ACTOR} createdAt label { name } }
  ... on UnlabeledEvent { ${ACTOR} createdAt label { name } }
  ... on AssignedEvent { ${ACTOR} createdAt assignee { ... on User { login } } }
  ... on UnassignedEvent { ${ACTOR} createdAt assignee { ... on User { login } } }
  ... on RenamedTitleEvent { ${ACTOR} createdAt previousTitle currentTitle }
  ... on ReferencedEvent {
    ${ACTOR} createdAt isCrossRepository
    commit { messageHeadline }
    commitRepository { owner { login } name }
  }
  ... on CrossReferencedEvent {
    ${ACTOR} createdAt isCrossRepository
    source {
      __typename
      ... on Issue { number title repository { owner { login } name } }
      ... on PullRequest { number title repository { owner { login } name } }
    }
  }
  ... on ConnectedEvent {
    ${ACTOR} createdAt
    source {
      __typename
      ... on Issue { number title }
      ... on PullRequest { number title }
    }
  }
  ... on LockedEvent { ${ACTOR} createdAt lockReason }
  ... on UnlockedEvent { ${ACTOR} createdAt }
  ... on MilestonedEvent { ${ACTOR} createdAt milestoneTitle }
  ... on PinnedEvent { ${ACTOR} createdAt }
  ... on UnpinnedEvent { ${ACTOR} createdAt }
  ... on MarkedAsDuplicateEvent {
    ${ACTOR} createdAt
    canonical {
      __typename
      ... on Issue { number title }
      ... on PullRequest { number title }
    }
  }
  ... on UnmarkedAsDuplicateEvent { ${ACTOR} createdAt }
  ... on SubscribedEvent { ${ACTOR} createdAt }
  ... on MentionedEvent { ${ACTOR} createdAt }`;

const PULL_REQUEST_ITEM_FRAGMENTS = `
  ... on MergedEvent { ${ACTOR} createdAt mergeRefName }
  ... on PullRequestReview { author { login } createdAt state body }
  ... on ReviewRequestedEvent {
    ${ACTOR} createdAt
    requestedReviewer {
      __typename
      ... on User { login }
      ... on Team { name }
    }
  }
  ... on PullRequestCommit { commit { messageHeadline abbreviatedOid committedDate author { user { login } } } }
  ... on ConvertToDraftEvent { ${ACTOR} createdAt }
  ... on ReadyForReviewEvent { ${ACTOR} createdAt }
  ... on HeadRefDeletedEvent { ${ACTOR} createdAt headRefName }
  ... on HeadRefForcePushedEvent {
    ${ACTOR} createdAt
    beforeCommit { abbreviatedOid }
    afterCommit { abbreviatedOid }
  }`;

export const ISSUE_TIMELINE_QUERY = `
query IssueTimeline($owner: String!, $name: String!, $number: Int!) {
  repository(owner: $owner, name: $name) {
    issue(number: $number) {
      timelineItems(first: 100) {
        nodes {${TIMELINE_ITEM_FRAGMENTS}
        }
      }
    }
  }
}`;

export const PULL_REQUEST_TIMELINE_QUERY = `
query PullRequestTimeline($owner: String!, $name: String!, $number: Int!) {
  repository(owner: $owner, name: $name) {
    pullRequest(number: $number) {
      timelineItems(first: 100) {
        nodes {${TIMELINE_ITEM_FRAGMENTS}${PULL_REQUEST_ITEM_FRAGMENTS}
        }
      }
    }
  }
}`;

export const DISCUSSION_QUERY = `
query DiscussionDetail($owner: String!, $name: String!, $number: Int!) {
  repository(owner: $owner, name: $name) {
    discussion(number: $number) {
      author { login }
      upvoteCount
      body
      createdAt
      answer { id }
      comments(first: 50) {
        nodes {
          id
          author { login }
          upvoteCount
          body
          createdAt
          replies(first: 20) {
            nodes { author { login } body createdAt }
          }
        }
      }
    }
  }
}`;
