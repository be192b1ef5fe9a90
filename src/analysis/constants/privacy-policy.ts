export interface PrivacyPolicySection {
  heading: string;
  body: string;
}

export interface PrivacyPolicy {
  title: string;
  sections: PrivacyPolicySection[];
}

export const PRIVACY_POLICY: PrivacyPolicy = {
  title: 'Data Storage Disclaimer',
  sections: [
    {
      heading: 'Data Storage',
      body: 'Your uploaded image is processed temporarily for analysis and is not saved or retained after processing.',
    },
    {
      heading: 'Third-Party Processing',
      body: 'To produce a result, the image is sent to a hosted detection model operated by a third party. It is transmitted only for the duration of the analysis request.',
    },
    {
      heading: 'Purpose of Data Collection',
      body: 'Results are used solely to assess the accuracy and effectiveness of the kidney stone detection model for academic research. They are not used for commercial purposes.',
    },
    {
      heading: 'Confidentiality',
      body: 'Any findings reported from this research are presented in aggregate so that individual submissions cannot be identified.',
    },
    {
      heading: 'Voluntary Participation',
      body: 'Participation is voluntary and you may stop at any time.',
    },
    {
      heading: 'Not a Diagnosis',
      body: 'The result is produced by an automated model and is not a medical diagnosis. Consult a qualified clinician for medical advice.',
    },
  ],
};
