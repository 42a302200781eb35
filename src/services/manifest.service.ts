/**
 * Manifest Service
 *
 * Builds the packaging documents that sit beside the assessment file:
 * - imsmanifest.xml at the archive root, listing every item and declaring
 *   the assessment resource
 * - assessment_meta.xml inside the package folder, with the quiz settings
 *   Canvas reads on import
 */

import { XML_DECLARATION, XmlElement, buildXml } from '../utils/xml';

export const MANIFEST_FILENAME = 'imsmanifest.xml';
export const ASSESSMENT_META_FILENAME = 'assessment_meta.xml';

export const QTI_RESOURCE_TYPE = 'imsqti_xmlv1p2';
const META_RESOURCE_TYPE = 'associatedcontent/imscc_xmlv1p1/learning-application-resource';

const MANIFEST_NAMESPACE = 'http://www.imsglobal.org/xsd/imsccv1p1/imscp_v1p1';
const QUIZ_NAMESPACE = 'http://canvas.instructure.com/xsd/cccv1p0';

/**
 * Archive paths for a package
 */
export interface PackageLayout {
  name: string;
  assessmentPath: string;
  metaPath: string;
}

export function packageLayout(name: string): PackageLayout {
  return {
    name,
    assessmentPath: `${name}/${name}.xml`,
    metaPath: `${name}/${ASSESSMENT_META_FILENAME}`,
  };
}

export interface AssessmentSummary {
  title: string;
  questionCount: number;
  pointsPossible: number;
  createdDate: string;
}

/**
 * IMS content package manifest: one organization item per question, one
 * resource for the assessment and one for its metadata.
 */
export function buildManifest(layout: PackageLayout, questionIds: string[], title: string): string {
  const metaIdent = `${layout.name}_meta`;
  const document: XmlElement = {
    '?xml': XML_DECLARATION,
    manifest: {
      '@_identifier': `${layout.name}_manifest`,
      '@_xmlns': MANIFEST_NAMESPACE,
      metadata: {
        schema: 'IMS Content',
        schemaversion: '1.1.3',
      },
      organizations: {
        organization: {
          '@_identifier': 'org_1',
          '@_structure': 'rooted-hierarchy',
          item: {
            '@_identifier': 'LearningModules',
            title,
            item: questionIds.map(id => ({
              '@_identifier': id,
              '@_identifierref': layout.name,
              title: id,
            })),
          },
        },
      },
      resources: {
        resource: [
          {
            '@_identifier': layout.name,
            '@_type': QTI_RESOURCE_TYPE,
            '@_href': layout.assessmentPath,
            file: { '@_href': layout.assessmentPath },
            dependency: { '@_identifierref': metaIdent },
          },
          {
            '@_identifier': metaIdent,
            '@_type': META_RESOURCE_TYPE,
            '@_href': layout.metaPath,
            file: { '@_href': layout.metaPath },
          },
        ],
      },
    },
  };
  return buildXml(document);
}

/**
 * Quiz settings document
 */
export function buildAssessmentMeta(layout: PackageLayout, summary: AssessmentSummary): string {
  const document: XmlElement = {
    '?xml': XML_DECLARATION,
    quiz: {
      '@_identifier': layout.name,
      '@_xmlns': QUIZ_NAMESPACE,
      title: summary.title,
      description: `Assessment with ${summary.questionCount} questions`,
      created_date: summary.createdDate,
      question_count: summary.questionCount,
      points_possible: summary.pointsPossible,
      quiz_type: 'assignment',
      shuffle_answers: 'false',
      allowed_attempts: 1,
    },
  };
  return buildXml(document);
}
