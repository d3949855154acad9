export type TopicRule = {
  match: RegExp;
  name: string;
};

export type ModelProfile = {
  name: string;
  prefixes: string[];
  /** Consulted for state-style items, whose meaning lives in the topic. */
  topicRules: TopicRule[];
};

const STATE_ITEM_NAMES = new Set(['state', 'logicalstate', 'active', 'isactive']);

export const GENERIC_PROFILE: ModelProfile = {
  name: 'generic',
  prefixes: [],
  topicRules: []
};

export const MODEL_PROFILES: ModelProfile[] = [
  {
    name: 'tapo',
    prefixes: ['tapo', 'tp-link', 'c2', 'c3', 'c5'],
    topicRules: [{ match: /MotionAlarm$/i, name: 'IsMotion' }]
  },
  {
    name: 'reolink',
    prefixes: ['reolink', 'rlc', 'e1', 'duo', 'trackmix'],
    topicRules: [
      { match: /PeopleDetect$/i, name: 'IsPeople' },
      { match: /VehicleDetect$/i, name: 'IsCar' },
      { match: /DogCatDetect$/i, name: 'IsPet' },
      { match: /FaceDetect$/i, name: 'IsFace' },
      { match: /Visitor$/i, name: 'IsVisitor' },
      { match: /(MotionAlarm|Motion)$/i, name: 'IsMotion' }
    ]
  },
  {
    name: 'hikvision',
    prefixes: ['hikvision', 'hik', 'ds-', 'annke'],
    topicRules: [
      { match: /MotionAlarm$/i, name: 'IsMotion' },
      { match: /FieldDetector\/ObjectsInside$/i, name: 'IsIntrusion' },
      { match: /LineDetector\/Crossed$/i, name: 'IsLineCrossing' }
    ]
  },
  {
    name: 'dahua',
    prefixes: ['dahua', 'ipc-', 'amcrest', 'lorex'],
    topicRules: [
      { match: /(Human|People|Person)/i, name: 'IsPeople' },
      { match: /(Vehicle|Car)/i, name: 'IsCar' },
      { match: /MotionAlarm$/i, name: 'IsMotion' }
    ]
  },
  {
    name: 'axis',
    prefixes: ['axis'],
    topicRules: [
      { match: /ObjectAnalytics\/.*Human/i, name: 'IsPeople' },
      { match: /ObjectAnalytics\/.*Vehicle/i, name: 'IsCar' },
      { match: /\/VMD\//i, name: 'IsMotion' },
      { match: /MotionAlarm$/i, name: 'IsMotion' }
    ]
  }
];

export function findModelProfile(model: string | null | undefined): ModelProfile {
  const normalized = typeof model === 'string' ? model.trim().toLowerCase() : '';
  if (!normalized) {
    return GENERIC_PROFILE;
  }
  return (
    MODEL_PROFILES.find(profile =>
      profile.prefixes.some(prefix => normalized.startsWith(prefix))
    ) ?? GENERIC_PROFILE
  );
}

export function isStateItemName(name: string): boolean {
  return STATE_ITEM_NAMES.has(name.toLowerCase());
}

/** Strips namespace prefixes such as `tns1:` from each topic segment. */
export function cleanTopic(topic: string): string {
  return topic
    .split('/')
    .map(segment => segment.replace(/^[A-Za-z0-9_-]+:/, '').trim())
    .filter(Boolean)
    .join('/');
}

/** Named items pass through verbatim; state-style items take their name from the topic. */
export function resolveEventName(
  profile: ModelProfile,
  itemName: string,
  topic: string | null
): string {
  if (!isStateItemName(itemName)) {
    return itemName;
  }

  if (!topic) {
    return itemName;
  }

  const rule = profile.topicRules.find(candidate => candidate.match.test(topic));
  if (rule) {
    return rule.name;
  }

  const segments = topic.split('/');
  return segments[segments.length - 1] || itemName;
}
