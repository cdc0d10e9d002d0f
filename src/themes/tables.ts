export type ThemeRule = [RegExp, string];

// Evaluated top to bottom; the first matching rule names the theme
export const STRENGTH_THEMES: ThemeRule[] = [
  [/memory|recall|remember/i, 'Strong memory skills'],
  [/audit(ory)?|listen|hear/i, 'Strong auditory processing'],
  [/visual|see|observ|notic/i, 'Visual awareness'],
  [/creative|art|music|draw|paint|design/i, 'Creative expression'],
  [/social|friend|peer|communicat|collaborat/i, 'Social engagement'],
  [/technolog|comput|digital|software|device/i, 'Technology proficiency'],
  [/read|liter|writ|story|book|narrat/i, 'Literacy strengths'],
  [/math|number|calculat|logic|quantit/i, 'Mathematical thinking'],
  [/organiz|plan|schedul|manag/i, 'Organisational skills'],
  [/persist|determin|resilient|motivat|driven/i, 'Persistence and motivation'],
  [/advocate|self-advocate|voice|speak up/i, 'Self-advocacy'],
  [/problem.?solv|analyt|critical/i, 'Analytical thinking'],
  [/curio|question|explor|investigat/i, 'Intellectual curiosity'],
  [/empathy|caring|kind|compassion/i, 'Empathy and compassion'],
  [/leader|mentor|initiative/i, 'Leadership'],
  [/adapt|flexible|adjust/i, 'Adaptability'],
  [/focus|concentrat|attent/i, 'Focused attention'],
  [/kinesthet|movement|physical|motor|sport|athlet/i, 'Physical/kinaesthetic strengths'],
  [/humor|funny|joke/i, 'Sense of humour'],
  [/science|biology|chemistry|physics|lab/i, 'Science aptitude']
];

// Goals have their own table: "art" as a goal is a pursuit, not a skill
export const GOAL_THEMES: ThemeRule[] = [
  [/post.?secondary|college|university|higher.?ed/i, 'Post-secondary education'],
  [/career|job|employ|work|profession/i, 'Career aspirations'],
  [/independen|self.?suffic|autonomy/i, 'Independence'],
  [/communit|belong|inclus|social/i, 'Community participation'],
  [/technolog|comput|STEM|engineer/i, 'Technology/STEM interests'],
  [/art|music|creativ|perform|theater|theatre/i, 'Creative pursuits'],
  [/advocate|rights|justice|activis/i, 'Advocacy and rights'],
  [/travel|explore|abroad/i, 'Exploration and travel'],
  [/health|wellbeing|fitness/i, 'Health and wellbeing'],
  [/mentor|teach|help others/i, 'Mentoring others']
];
